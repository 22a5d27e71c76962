import { type AccidentalSource, resolveAccidentalSource } from "./accidentals";
import { distanceFromNut, frequencyAt } from "./acoustics";
import { type PitchToken, parsePitchToken } from "./notes";
import { DEFAULT_BACKSTEP_TOLERANCE, type ResolvedCents, resolveAbsoluteCents } from "./octaves";
import { parsePitchList } from "./pitchList";
import {
  DEFAULT_REFERENCE_HZ,
  DEFAULT_STRING_LENGTH,
  type TuningContext,
  createTuningContext,
} from "./tunings";

export type FretRow = {
  index: number;
  pitch: string;
  cents: number;
  frequencyHz: number;
  nutToFret: number;
  spacing: number;
  // Negative cents: the pitch lies behind the nut and has no physical fret.
  offFretboard: boolean;
};

export type FretTableErrorCode =
  | "invalid-input"
  | "empty-list"
  | "malformed-token"
  | "unknown-accidental";

export type FretTableResult =
  | { ok: true; rows: FretRow[]; context: TuningContext }
  | { ok: false; error: string; code: FretTableErrorCode; field?: string };

export type FretTableRequest = {
  text: string;
  referenceHz?: number;
  stringLength?: number;
  accidentals?: AccidentalSource;
  tolerance?: number;
  decimals?: number;
};

export const DEFAULT_DECIMALS = 3;
export const MAX_DECIMALS = 10;

// Falls back to the default for anything buildFretTable would reject.
export function decimalsFromEnv(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === "") return DEFAULT_DECIMALS;
  const value = Number(raw);
  return Number.isInteger(value) && value >= 0 && value <= MAX_DECIMALS ? value : DEFAULT_DECIMALS;
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const rounded = Math.round(value * factor) / factor;
  return rounded === 0 ? 0 : rounded;
}

export function buildFretRows(
  context: TuningContext,
  pitches: ResolvedCents[],
  decimals = DEFAULT_DECIMALS,
): FretRow[] {
  let previousDistance: number | null = null;
  return pitches.map(({ token, cents }, i): FretRow => {
    const distance = distanceFromNut(context.stringLength, cents);
    const spacing = previousDistance === null ? 0 : distance - previousDistance;
    previousDistance = distance;
    return {
      index: i + 1,
      pitch: token.text,
      cents: roundTo(cents, decimals),
      frequencyHz: roundTo(frequencyAt(context.referenceHz, cents), decimals),
      nutToFret: roundTo(distance, decimals),
      spacing: roundTo(spacing, decimals),
      offFretboard: cents < 0,
    };
  });
}

/**
 * Turns a pitch list into fret rows: numeric input is checked first, then every token is
 * parsed and resolved. Either all rows come back or a single error naming the token or field.
 */
export function buildFretTable(request: FretTableRequest): FretTableResult {
  const {
    text,
    referenceHz = DEFAULT_REFERENCE_HZ,
    stringLength = DEFAULT_STRING_LENGTH,
    accidentals = { kind: "preset", preset: "folk" },
    tolerance = DEFAULT_BACKSTEP_TOLERANCE,
    decimals = DEFAULT_DECIMALS,
  } = request;

  const table = resolveAccidentalSource(accidentals);
  if (!table.ok) return { ok: false, error: table.error, code: "invalid-input", field: table.field };

  const tuning = createTuningContext({ referenceHz, stringLength, accidentals: table.table });
  if (!tuning.ok) return { ok: false, error: tuning.error, code: "invalid-input", field: tuning.field };

  if (!Number.isFinite(tolerance) || tolerance < 0) {
    return { ok: false, error: "Tolerance must be a non-negative number of cents", code: "invalid-input", field: "tolerance" };
  }
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > MAX_DECIMALS) {
    return {
      ok: false,
      error: `Decimals must be an integer from 0 to ${MAX_DECIMALS}`,
      code: "invalid-input",
      field: "decimals",
    };
  }

  const order = parsePitchList(text);
  if (!order.length) return { ok: false, error: "Pitch list is empty", code: "empty-list" };

  const tokens: PitchToken[] = [];
  for (const raw of order) {
    const token = parsePitchToken(raw);
    if (!token) {
      return { ok: false, error: `Unknown base note in token '${raw}'`, code: "malformed-token" };
    }
    tokens.push(token);
  }

  const resolved = resolveAbsoluteCents(tokens, tuning.context.accidentals, tolerance);
  if (!resolved.ok) return { ok: false, error: resolved.error, code: resolved.code };

  return {
    ok: true,
    rows: buildFretRows(tuning.context, resolved.pitches, decimals),
    context: tuning.context,
  };
}
