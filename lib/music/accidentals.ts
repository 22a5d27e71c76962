export type AccidentalTable = Record<string, number>;

export type CommaPresetId = "folk" | "aeu-53" | "edo-24";

export type CommaPreset = {
  id: CommaPresetId;
  label: string;
  flat: number;
  doubleFlat: number;
  threeCommaSharp: number;
};

export type AccidentalSource =
  | { kind: "preset"; preset: CommaPresetId; overrides?: AccidentalTable }
  | { kind: "cents"; cents: AccidentalTable; overrides?: AccidentalTable }
  | {
      kind: "commas";
      commaSize: number;
      commasPerSemitone?: number;
      counts?: AccidentalTable;
      overrides?: AccidentalTable;
    };

export type AccidentalTableResult =
  | { ok: true; table: AccidentalTable }
  | { ok: false; error: string; field: string };

export const FOLK_COMMA_CENTS = 22.64;

export const DEFAULT_ACCIDENTAL_CENTS: Readonly<AccidentalTable> = Object.freeze({
  "": 0,
  b: -22.64,
  b1: -22.64,
  b2: -45.28,
  "#3": 67.92,
  "#": 100,
  "#1": 22.64,
  "#2": 45.28,
  "#5": 113.2,
  b3: -67.92,
  b4: -90.57,
});

// Signed comma counts per symbol; "#" is handled apart since it is a semitone.
export const DEFAULT_COMMA_COUNTS: Readonly<AccidentalTable> = Object.freeze({
  b: -1,
  b1: -1,
  b2: -2,
  b3: -3,
  b4: -4,
  "#1": 1,
  "#2": 2,
  "#3": 3,
  "#5": 5,
});

export const COMMA_PRESETS: CommaPreset[] = [
  {
    id: "folk",
    label: "Folk (b=-22.64, b2=-45.28, #3=+67.92)",
    flat: -22.64,
    doubleFlat: -45.28,
    threeCommaSharp: 67.92,
  },
  {
    id: "aeu-53",
    label: "AEU ~53-comma (≈22.64 c per comma)",
    flat: -FOLK_COMMA_CENTS,
    doubleFlat: -2 * FOLK_COMMA_CENTS,
    threeCommaSharp: 3 * FOLK_COMMA_CENTS,
  },
  {
    id: "edo-24",
    label: "24-EDO (quarter-tone approx)",
    flat: -50,
    doubleFlat: -100,
    threeCommaSharp: 150,
  },
];

export function isCommaPresetId(value: string): value is CommaPresetId {
  return COMMA_PRESETS.some((p) => p.id === value);
}

export function findCommaPreset(id: CommaPresetId): CommaPreset {
  const preset = COMMA_PRESETS.find((p) => p.id === id);
  return preset ?? COMMA_PRESETS[0];
}

export function lookupAccidental(table: AccidentalTable, symbol: string): number | undefined {
  return Object.prototype.hasOwnProperty.call(table, symbol) ? table[symbol] : undefined;
}

export function accidentalTableFromPreset(id: CommaPresetId): AccidentalTable {
  const preset = findCommaPreset(id);
  return {
    ...DEFAULT_ACCIDENTAL_CENTS,
    b: preset.flat,
    b1: preset.flat,
    b2: preset.doubleFlat,
    "#3": preset.threeCommaSharp,
  };
}

export function accidentalTableFromCommas(options: {
  commaSize: number;
  commasPerSemitone?: number;
  counts?: AccidentalTable;
}): AccidentalTable {
  const { commaSize, commasPerSemitone, counts = DEFAULT_COMMA_COUNTS } = options;
  const table: AccidentalTable = { "": 0 };
  for (const [symbol, count] of Object.entries(counts)) {
    table[symbol] = count * commaSize;
  }
  table["#"] = commasPerSemitone !== undefined ? commasPerSemitone * commaSize : 100;
  return table;
}

function firstNonFinite(table: AccidentalTable): string | null {
  for (const [symbol, cents] of Object.entries(table)) {
    if (!Number.isFinite(cents)) return symbol;
  }
  return null;
}

function sourceError(source: AccidentalSource): AccidentalTableResult | null {
  if (source.kind !== "commas") return null;
  if (!Number.isFinite(source.commaSize) || source.commaSize <= 0) {
    return { ok: false, error: "Comma size must be a positive number", field: "commaSize" };
  }
  const { commasPerSemitone } = source;
  if (commasPerSemitone !== undefined && (!Number.isFinite(commasPerSemitone) || commasPerSemitone <= 0)) {
    return { ok: false, error: "Commas per semitone must be a positive number", field: "commasPerSemitone" };
  }
  return null;
}

function tableForSource(source: AccidentalSource): AccidentalTable {
  switch (source.kind) {
    case "preset":
      return { ...accidentalTableFromPreset(source.preset), ...source.overrides };
    case "cents":
      return { ...source.cents, ...source.overrides };
    case "commas":
      return { ...accidentalTableFromCommas(source), ...source.overrides };
  }
}

export function resolveAccidentalSource(source: AccidentalSource): AccidentalTableResult {
  const invalid = sourceError(source);
  if (invalid) return invalid;

  const table = tableForSource(source);
  // The natural accidental is always available and always zero.
  table[""] = 0;

  const bad = firstNonFinite(table);
  if (bad !== null) {
    return { ok: false, error: `Accidental '${bad}' must be a finite number of cents`, field: "accidentals" };
  }
  return { ok: true, table };
}
