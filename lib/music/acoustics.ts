export function centsToRatio(cents: number): number {
  return 2 ** (cents / 1200);
}

export function ratioToCents(ratio: number): number {
  return 1200 * Math.log2(ratio);
}

export function frequencyAt(referenceHz: number, cents: number): number {
  return referenceHz * centsToRatio(cents);
}

/**
 * Nut-to-fret distance for a pitch `cents` above the open string, in the unit of `stringLength`.
 * The vibrating length is L0 / 2^(c/1200), so the fret sits at L0 * (1 - 2^(-c/1200)).
 * Negative cents give a negative distance (behind the nut).
 */
export function distanceFromNut(stringLength: number, cents: number): number {
  return stringLength * (1 - 2 ** (-cents / 1200));
}

// Inverse of distanceFromNut; only defined for distance < stringLength.
export function centsAtDistance(stringLength: number, distance: number): number {
  return -ratioToCents(1 - distance / stringLength);
}
