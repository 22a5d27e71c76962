import { describe, expect, it } from "vitest";
import { POST } from "@/app/api/frets/route";
import { NextRequest } from "next/server";

function post(body: unknown) {
  return new NextRequest(new URL("http://localhost/api/frets"), {
    method: "POST",
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
}

describe("POST /api/frets", () => {
  it("returns fret rows as JSON", async () => {
    const res = await POST(post({ pitches: "mi, fa, fa#3", referenceHz: 440, stringLength: 580 }));
    const body = await res.json();
    expect(res.status).toBe(200);
    expect(body.rows.map((r: { cents: number }) => r.cents)).toEqual([200, 300, 367.92]);
    expect(body.context).toMatchObject({ referenceHz: 440, stringLength: 580 });
  });

  it("returns a CSV download", async () => {
    const res = await POST(post({ pitches: "re\nla", format: "csv" }));
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("text/csv; charset=utf-8");
    expect(res.headers.get("content-disposition")).toBe('attachment; filename="turkish_fret_calculator.csv"');
    expect(await res.text()).toBe(
      "#,pitch,cents_from_re,frequency_hz,nut_to_fret,spacing\n" +
        "1,re,0,440,0,0\n" +
        "2,la,700,659.255,192.896,192.896\n",
    );
  });

  it("accepts a preset name for the accidentals", async () => {
    const res = await POST(post({ pitches: "mi b", accidentals: "edo-24" }));
    const body = await res.json();
    expect(body.rows[0].cents).toBe(150);
  });

  it("accepts a comma size for the accidentals", async () => {
    const res = await POST(post({ pitches: "mi #3", accidentals: { commaSize: 20 } }));
    const body = await res.json();
    expect(body.rows[0].cents).toBe(260);
  });

  it("applies edited values on top of a cents table", async () => {
    const res = await POST(post({ pitches: "mi b", accidentals: { cents: { b: -22 }, overrides: { b: -30 } } }));
    const body = await res.json();
    expect(res.status).toBe(200);
    expect(body.rows[0].cents).toBe(170);
  });

  it("rejects missing pitches", async () => {
    const res = await POST(post({}));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Pitch list is required", field: "pitches" });
  });

  it("rejects a body that is not JSON", async () => {
    const res = await POST(post("pitches=mi"));
    expect(res.status).toBe(400);
  });

  it("rejects a zero string length", async () => {
    const res = await POST(post({ pitches: "mi", stringLength: 0 }));
    expect(res.status).toBe(400);
    expect((await res.json()).field).toBe("stringLength");
  });

  it("rejects a non-numeric reference frequency", async () => {
    const res = await POST(post({ pitches: "mi", referenceHz: "440" }));
    expect(res.status).toBe(400);
    expect((await res.json()).field).toBe("referenceHz");
  });

  it("rejects an unknown preset", async () => {
    const res = await POST(post({ pitches: "mi", accidentals: "just" }));
    expect(res.status).toBe(400);
  });

  it("reports a malformed token", async () => {
    const res = await POST(post({ pitches: "mi, xyz" }));
    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({ error: "Unknown base note in token 'xyz'", code: "malformed-token" });
  });

  it("reports an accidental missing from an edited table", async () => {
    const res = await POST(post({ pitches: "mi b", accidentals: { cents: { "#3": 67.92 } } }));
    expect(res.status).toBe(422);
    expect((await res.json()).code).toBe("unknown-accidental");
  });
});
