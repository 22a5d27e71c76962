import type { FretRow } from "./fretboard";

export const CSV_COLUMNS = ["#", "pitch", "cents_from_re", "frequency_hz", "nut_to_fret", "spacing"] as const;

export const DEFAULT_CSV_FILENAME = "turkish_fret_calculator.csv";

function escapeField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function fretRowsToCsv(rows: FretRow[], options: { includeSpacing?: boolean } = {}): string {
  const { includeSpacing = true } = options;
  const columns: readonly string[] = includeSpacing ? CSV_COLUMNS : CSV_COLUMNS.slice(0, -1);
  const lines = [columns.map(escapeField).join(",")];
  for (const row of rows) {
    const fields: (string | number)[] = [row.index, row.pitch, row.cents, row.frequencyHz, row.nutToFret];
    if (includeSpacing) fields.push(row.spacing);
    lines.push(fields.map(escapeField).join(","));
  }
  return `${lines.join("\n")}\n`;
}
