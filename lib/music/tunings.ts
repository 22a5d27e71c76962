import type { AccidentalTable } from "./accidentals";

export type TuningContext = Readonly<{
  referenceHz: number;
  stringLength: number;
  accidentals: Readonly<AccidentalTable>;
}>;

export type TuningContextResult =
  | { ok: true; context: TuningContext }
  | { ok: false; error: string; field: "referenceHz" | "stringLength" };

export type OrderPreset = {
  id: string;
  label: string;
  text: string;
};

// Open string re at 440 Hz on a 580 mm short-neck bağlama.
export const DEFAULT_REFERENCE_HZ = 440;
export const DEFAULT_STRING_LENGTH = 580;

// Lower string, flatter to sharper inside each degree.
export const DEFAULT_ORDER =
  "mi b2, mi b, mi,\n" +
  "fa, fa#3, fa#,\n" +
  "sol, sol#3, sol#,\n" +
  "la,\n" +
  "si b2, si b, si,\n" +
  "do, do #3, do #,\n" +
  "re,\n" +
  "mi b2, mi b, mi";

export const ORDER_PRESETS: OrderPreset[] = [
  { id: "lower-string", label: "Lower string (corrected, flatter→sharper)", text: DEFAULT_ORDER },
  {
    id: "naturals",
    label: "Naturals up to octave",
    text: "mi, fa, fa#, sol, sol#, la, si, do, do#, re, mi",
  },
];

function isPositive(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

export function createTuningContext(options: {
  referenceHz: number;
  stringLength: number;
  accidentals: AccidentalTable;
}): TuningContextResult {
  const { referenceHz, stringLength, accidentals } = options;
  if (!isPositive(referenceHz)) {
    return { ok: false, error: "Reference frequency must be a positive number of Hz", field: "referenceHz" };
  }
  if (!isPositive(stringLength)) {
    return { ok: false, error: "String length must be a positive number", field: "stringLength" };
  }
  return {
    ok: true,
    context: Object.freeze({
      referenceHz,
      stringLength,
      accidentals: Object.freeze({ ...accidentals }),
    }),
  };
}
