/**
 * csv-parser.ts — Minimal CSV reader shared by the fleet and ROI importers
 *
 * Handles:
 *   - "," ";" or tab separators (detected from the header line)
 *   - quoted fields with "" escapes, line breaks included
 *   - a UTF-8 BOM
 *   - rows exported as one quoted field ("a,b,c"), which are unwrapped
 */

export interface CsvTable {
  header: string[];
  rows: string[][];
}

interface CsvField {
  value: string;
  quoted: boolean;
}

export function detectSeparator(headerLine: string): string {
  if (headerLine.includes(";")) return ";";
  if (headerLine.includes("\t")) return "\t";
  return ",";
}

/**
 * Tokenize into records. A record ends at a line break outside quotes, so a
 * quoted field may span lines. Blank lines are dropped.
 */
function readRecords(text: string, sep: string): CsvField[][] {
  const records: CsvField[][] = [];
  let record: CsvField[] = [];
  let field = "";
  let quoted = false;
  let inQuotes = false;

  const endField = () => {
    record.push({ value: field.trim(), quoted });
    field = "";
    quoted = false;
  };
  const endRecord = () => {
    endField();
    const blank = record.length === 1 && !record[0].quoted && record[0].value === "";
    if (!blank) records.push(record);
    record = [];
  };

  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (inQuotes) {
      if (c !== '"') {
        field += c;
      } else if (text[i + 1] === '"') {
        field += '"';
        i++;
      } else {
        inQuotes = false;
      }
    } else if (c === '"') {
      inQuotes = true;
      quoted = true;
      if (!field.trim()) field = "";
    } else if (c === sep) {
      endField();
    } else if (c === "\n") {
      endRecord();
    } else if (c === "\r") {
      if (text[i + 1] === "\n") i++;
      endRecord();
    } else if (!quoted) {
      field += c;
    }
  }
  endRecord();
  return records;
}

function splitCsvLine(line: string, sep: string): string[] {
  const [record] = readRecords(line, sep);
  return record ? record.map(f => f.value) : [""];
}

/** A record exported as one quoted field ("a,b,c") is split again. */
function unwrap(record: CsvField[], sep: string): string[] {
  if (record.length === 1 && record[0].quoted && record[0].value.includes(sep)) {
    return splitCsvLine(record[0].value, sep);
  }
  return record.map(f => f.value);
}

/** Parse into header + rows. Returns null when there is no header line. */
export function parseCsvTable(content: string): CsvTable | null {
  const text = content.replace(/^\uFEFF/, "");
  const firstBreak = text.search(/[\r\n]/);
  const sep = detectSeparator(firstBreak < 0 ? text : text.slice(0, firstBreak));

  const records = readRecords(text, sep);
  if (records.length === 0) return null;

  const header = unwrap(records[0], sep);
  // In a one-column table a quoted value holding the separator is data.
  const rows = records
    .slice(1)
    .map(r => (header.length > 1 ? unwrap(r, sep) : r.map(f => f.value)));
  return { header, rows };
}

/** Normalized header key: "Device Model" → "device_model". */
export function normalizeHeader(h: string): string {
  return h.trim().toLowerCase().replace(/[\s-]+/g, "_");
}

/** Column index for the first matching alias (compared normalized), or -1. */
export function findColumn(header: string[], aliases: string[]): number {
  const normalized = header.map(normalizeHeader);
  for (const alias of aliases) {
    const idx = normalized.indexOf(normalizeHeader(alias));
    if (idx >= 0) return idx;
  }
  return -1;
}

/** Parse a number; "" and non-numeric text give null. Accepts a decimal comma. */
export function parseNumber(s: string | undefined): number | null {
  if (s === undefined || !s.trim()) return null;
  let clean = s.trim().replace(/\s/g, "");
  if (clean.includes(",") && !clean.includes(".")) {
    clean = clean.replace(",", ".");
  }
  const n = Number(clean);
  return Number.isFinite(n) ? n : null;
}
