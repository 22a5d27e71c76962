export type BaseNote =
  | "re"
  | "mi"
  | "fa"
  | "fa#"
  | "sol"
  | "sol#"
  | "la"
  | "sib"
  | "si"
  | "do"
  | "do#";

// Cents above the open string (re = 0). The next re sits at 1200.
export const BASE_NOTE_CENTS: Record<BaseNote, number> = {
  re: 0,
  mi: 200,
  fa: 300,
  "fa#": 400,
  sol: 500,
  "sol#": 600,
  la: 700,
  sib: 800,
  si: 900,
  do: 1000,
  "do#": 1100,
};

// Longest first so "#3" is never read as "#" plus a stray "3".
export const ACCIDENTAL_SUFFIXES = [
  "#5",
  "#3",
  "#2",
  "#1",
  "b4",
  "b3",
  "b2",
  "b1",
  "#",
  "b",
] as const;

export type PitchToken = {
  text: string;
  base: BaseNote;
  accidental: string;
};

export function isBaseNote(value: string): value is BaseNote {
  return Object.prototype.hasOwnProperty.call(BASE_NOTE_CENTS, value);
}

export function normalizeToken(input: string): string {
  return input
    .trim()
    .toLowerCase()
    .replace(/\s+/g, " ")
    .replace(/♯/g, "#")
    .replace(/♭/g, "b");
}

// Spellings of the sib degree itself, not si with a comma flat.
const SIB_ALIASES: ReadonlySet<string> = new Set(["sib", "si b", "si bb"]);

function splitToken(normalized: string): { base: string; accidental: string } {
  if (SIB_ALIASES.has(normalized)) return { base: "sib", accidental: "" };

  const space = normalized.indexOf(" ");
  if (space >= 0) {
    return { base: normalized.slice(0, space), accidental: normalized.slice(space + 1) };
  }

  for (const suffix of ACCIDENTAL_SUFFIXES) {
    if (normalized.endsWith(suffix)) {
      return { base: normalized.slice(0, -suffix.length), accidental: suffix };
    }
  }
  return { base: normalized, accidental: "" };
}

/**
 * Parses one pitch such as "mi b2", "fa#3", "do #" or "sib".
 * "fa#" is read as fa plus the "#" accidental, so it follows the active table.
 * Returns null when no known base note is left after the accidental is split off.
 * The accidental is not checked against any table here.
 */
export function parsePitchToken(input: string): PitchToken | null {
  const normalized = normalizeToken(input);
  if (!normalized) return null;
  const { base, accidental } = splitToken(normalized);
  if (!isBaseNote(base)) return null;
  return { text: input.trim(), base, accidental };
}

export function baseNoteCents(base: BaseNote): number {
  return BASE_NOTE_CENTS[base];
}
