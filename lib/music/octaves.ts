import { type AccidentalTable, lookupAccidental } from "./accidentals";
import { type PitchToken, baseNoteCents } from "./notes";

export const OCTAVE_CENTS = 1200;

// One semitone. Must stay below the smallest ascending fret gap and above
// the largest comma-sized backstep in the order.
export const DEFAULT_BACKSTEP_TOLERANCE = 100;

export type ResolvedCents = {
  token: PitchToken;
  cents: number;
};

export type ResolveResult =
  | { ok: true; pitches: ResolvedCents[] }
  | { ok: false; error: string; code: "unknown-accidental" };

/**
 * Places each pitch of an ascending fretboard order at absolute cents above the open string.
 *
 * A step that lands more than `tolerance` below the previous pitch is an octave wrap and
 * shifts this and every later pitch up by 1200 cents. Smaller backsteps (a comma-flat
 * sitting just under the previous fret) are kept where they fall. Lists that descend
 * overall are not supported.
 */
export function resolveAbsoluteCents(
  tokens: PitchToken[],
  accidentals: AccidentalTable,
  tolerance = DEFAULT_BACKSTEP_TOLERANCE,
): ResolveResult {
  const pitches: ResolvedCents[] = [];
  let previous = Number.NEGATIVE_INFINITY;
  let shift = 0;

  for (const token of tokens) {
    const accidentalCents = lookupAccidental(accidentals, token.accidental);
    if (accidentalCents === undefined) {
      return {
        ok: false,
        error: `Unknown accidental '${token.accidental}' in token '${token.text}'`,
        code: "unknown-accidental",
      };
    }

    const unshifted = baseNoteCents(token.base) + accidentalCents;
    let proposed = unshifted + shift;
    if (proposed < previous - tolerance) {
      shift += OCTAVE_CENTS;
      proposed = unshifted + shift;
    }

    pitches.push({ token, cents: proposed });
    previous = proposed;
  }

  return { ok: true, pitches };
}
