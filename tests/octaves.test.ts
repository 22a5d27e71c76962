import { describe, expect, it } from "vitest";
import { type AccidentalTable, accidentalTableFromPreset } from "@/lib/music/accidentals";
import { type PitchToken, parsePitchToken } from "@/lib/music/notes";
import { resolveAbsoluteCents } from "@/lib/music/octaves";

function tokens(...inputs: string[]): PitchToken[] {
  return inputs.map((input) => {
    const token = parsePitchToken(input);
    if (!token) throw new Error(`test token '${input}' did not parse`);
    return token;
  });
}

function centsOf(inputs: string[], table: AccidentalTable, tolerance?: number): number[] {
  const result = resolveAbsoluteCents(tokens(...inputs), table, tolerance);
  if (!result.ok) throw new Error(result.error);
  return result.pitches.map((p) => p.cents);
}

const folk = accidentalTableFromPreset("folk");

describe("resolveAbsoluteCents", () => {
  it("keeps an ascending run in one octave", () => {
    const cents = centsOf(["mi", "fa", "fa#3"], { "": 0, "#3": 67.92 });
    expect(cents[0]).toBe(200);
    expect(cents[1]).toBe(300);
    expect(cents[2]).toBeCloseTo(367.92, 9);
  });

  it("wraps once when the open-string note comes back", () => {
    const cents = centsOf(["do", "re", "mi b2", "mi"], folk);
    expect(cents[0]).toBe(1000);
    expect(cents[1]).toBe(1200);
    expect(cents[2]).toBeCloseTo(1354.72, 9);
    expect(cents[3]).toBe(1400);
  });

  it("does not wrap on a comma-sized backstep", () => {
    const cents = centsOf(["mi", "mi b"], folk);
    expect(cents[0]).toBe(200);
    expect(cents[1]).toBeCloseTo(177.36, 9);
  });

  it("does not wrap on a drop of exactly the tolerance", () => {
    expect(centsOf(["sol", "fa#"], { "": 0, "#": 100 })).toEqual([500, 400]);
  });

  it("wraps on a drop larger than the tolerance", () => {
    expect(centsOf(["sol", "fa"], { "": 0 })).toEqual([500, 1500]);
  });

  it("adds a single octave per step even for very large drops", () => {
    expect(centsOf(["re up", "re"], { "": 0, up: 2500 })).toEqual([2500, 1200]);
  });

  it("honours a custom tolerance", () => {
    const cents = centsOf(["mi", "mi b"], folk, 10);
    expect(cents[1]).toBeCloseTo(1377.36, 9);
  });

  it("starts below the open string without wrapping", () => {
    const cents = centsOf(["re b", "re"], folk);
    expect(cents).toEqual([-22.64, 0]);
  });

  it("keeps separate calls independent", () => {
    const first = centsOf(["do", "re"], folk);
    const second = centsOf(["re"], folk);
    expect(first).toEqual([1000, 1200]);
    expect(second).toEqual([0]);
  });

  it("fails on an accidental missing from the table", () => {
    const result = resolveAbsoluteCents(tokens("mi", "mi #7"), folk);
    expect(result).toEqual({
      ok: false,
      error: "Unknown accidental '#7' in token 'mi #7'",
      code: "unknown-accidental",
    });
  });

  it("ignores inherited object keys when looking up accidentals", () => {
    const result = resolveAbsoluteCents(tokens("mi constructor"), folk);
    expect(result.ok).toBe(false);
  });
});
