import { NextResponse } from "next/server";
import {
  COMMA_PRESETS,
  DEFAULT_ACCIDENTAL_CENTS,
  DEFAULT_COMMA_COUNTS,
  FOLK_COMMA_CENTS,
  accidentalTableFromPreset,
} from "@/lib/music/accidentals";
import { BASE_NOTE_CENTS } from "@/lib/music/notes";
import { DEFAULT_BACKSTEP_TOLERANCE } from "@/lib/music/octaves";
import { DEFAULT_ORDER, DEFAULT_REFERENCE_HZ, DEFAULT_STRING_LENGTH, ORDER_PRESETS } from "@/lib/music/tunings";

// Everything the input form needs to populate itself.
export function GET() {
  return NextResponse.json({
    defaults: {
      referenceHz: DEFAULT_REFERENCE_HZ,
      stringLength: DEFAULT_STRING_LENGTH,
      order: DEFAULT_ORDER,
      tolerance: DEFAULT_BACKSTEP_TOLERANCE,
      commaSize: FOLK_COMMA_CENTS,
    },
    baseNotes: BASE_NOTE_CENTS,
    accidentals: DEFAULT_ACCIDENTAL_CENTS,
    commaCounts: DEFAULT_COMMA_COUNTS,
    commaPresets: COMMA_PRESETS.map((preset) => ({
      id: preset.id,
      label: preset.label,
      cents: accidentalTableFromPreset(preset.id),
    })),
    orderPresets: ORDER_PRESETS,
  });
}
