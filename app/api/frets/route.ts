import { NextRequest, NextResponse } from "next/server";
import { type AccidentalSource, type AccidentalTable, isCommaPresetId } from "@/lib/music/accidentals";
import { DEFAULT_CSV_FILENAME, fretRowsToCsv } from "@/lib/music/csv";
import { type FretTableRequest, buildFretTable, decimalsFromEnv } from "@/lib/music/fretboard";

const LOG_TIMINGS = process.env.LOG_TIMINGS === "1";
const CSV_FILENAME = process.env.FRET_CSV_FILENAME ?? DEFAULT_CSV_FILENAME;
const DEFAULT_PRECISION = decimalsFromEnv(process.env.FRET_DECIMALS);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readCentsTable(value: unknown): AccidentalTable | null {
  if (!isRecord(value)) return null;
  const table: AccidentalTable = {};
  for (const [symbol, cents] of Object.entries(value)) {
    if (typeof cents !== "number") return null;
    table[symbol] = cents;
  }
  return table;
}

function readOptionalNumber(value: unknown): number | undefined | null {
  if (value === undefined) return undefined;
  return typeof value === "number" ? value : null;
}

// Accepts a preset name, a { preset, overrides } object, a { cents } table or a
// { commaSize, commasPerSemitone?, counts?, overrides? } description.
function readAccidentals(value: unknown): AccidentalSource | null {
  if (typeof value === "string") {
    return isCommaPresetId(value) ? { kind: "preset", preset: value } : null;
  }
  if (!isRecord(value)) return null;

  const overrides = value.overrides === undefined ? undefined : readCentsTable(value.overrides);
  if (overrides === null) return null;

  if (typeof value.preset === "string") {
    return isCommaPresetId(value.preset) ? { kind: "preset", preset: value.preset, overrides } : null;
  }
  if (value.cents !== undefined) {
    const cents = readCentsTable(value.cents);
    return cents ? { kind: "cents", cents, overrides } : null;
  }
  if (typeof value.commaSize === "number") {
    const commasPerSemitone = readOptionalNumber(value.commasPerSemitone);
    const counts = value.counts === undefined ? undefined : readCentsTable(value.counts);
    if (commasPerSemitone === null || counts === null) return null;
    return { kind: "commas", commaSize: value.commaSize, commasPerSemitone, counts, overrides };
  }
  return null;
}

function badRequest(error: string, field?: string) {
  if (LOG_TIMINGS) console.warn("[frets] rejected request", { error, field });
  return NextResponse.json({ error, field }, { status: 400 });
}

export async function POST(req: NextRequest) {
  const t0 = Date.now();
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    return badRequest("Body must be JSON");
  }
  if (!isRecord(body)) return badRequest("Body must be a JSON object");

  const { pitches, format = "json" } = body;
  if (!pitches || typeof pitches !== "string") {
    return badRequest("Pitch list is required", "pitches");
  }
  if (format !== "json" && format !== "csv") {
    return badRequest("Format must be 'json' or 'csv'", "format");
  }

  const request: FretTableRequest = { text: pitches, decimals: DEFAULT_PRECISION };
  for (const field of ["referenceHz", "stringLength", "tolerance", "decimals"] as const) {
    const value = readOptionalNumber(body[field]);
    if (value === null) return badRequest(`${field} must be a number`, field);
    if (value !== undefined) request[field] = value;
  }
  if (body.accidentals !== undefined) {
    const accidentals = readAccidentals(body.accidentals);
    if (!accidentals) return badRequest("Accidentals must name a preset or give cents", "accidentals");
    request.accidentals = accidentals;
  }

  let result: ReturnType<typeof buildFretTable>;
  try {
    result = buildFretTable(request);
  } catch (error) {
    console.error("Fret table error", error);
    return NextResponse.json({ error: "Unable to compute fret table" }, { status: 500 });
  }

  if (!result.ok) {
    if (result.code === "invalid-input") return badRequest(result.error, result.field);
    if (LOG_TIMINGS) {
      console.info("[timing] api/frets", { result: result.code, totalMs: Date.now() - t0 });
    }
    return NextResponse.json({ error: result.error, code: result.code }, { status: 422 });
  }

  if (LOG_TIMINGS) {
    console.info("[timing] api/frets", { rows: result.rows.length, format, totalMs: Date.now() - t0 });
  }

  if (format === "csv") {
    const csv = fretRowsToCsv(result.rows, { includeSpacing: body.includeSpacing !== false });
    return new NextResponse(csv, {
      headers: {
        "content-type": "text/csv; charset=utf-8",
        "content-disposition": `attachment; filename="${CSV_FILENAME}"`,
      },
    });
  }
  return NextResponse.json({ rows: result.rows, context: result.context });
}
