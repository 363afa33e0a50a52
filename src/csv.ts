/**
 * Minimal CSV reading and writing (RFC 4180 quoting)
 */

const NEEDS_QUOTING = /[",\r\n]/;

/**
 * Quote a field when it contains a delimiter, quote or line break.
 *
 * @example
 * escapeCsvField('plain') // 'plain'
 * escapeCsvField('a, b') // '"a, b"'
 * escapeCsvField('say "hi"') // '"say ""hi"""'
 */
export function escapeCsvField(value: string): string {
  return NEEDS_QUOTING.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Serialize rows to CSV text, one line per row, with a trailing newline.
 */
export function toCsv(rows: string[][]): string {
  return rows.map((row) => row.map(escapeCsvField).join(",")).join("\n") + "\n";
}

/**
 * Parse CSV text into rows of fields.
 * Handles quoted fields with embedded commas, quotes and line breaks,
 * and both LF and CRLF line endings. Blank lines are dropped.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;

  const endRow = () => {
    row.push(field);
    if (row.length > 1 || row[0] !== "") rows.push(row);
    row = [];
    field = "";
  };

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ",") {
      row.push(field);
      field = "";
    } else if (char === "\n") {
      endRow();
    } else if (char !== "\r") {
      field += char;
    }
  }

  if (field !== "" || row.length > 0) endRow();
  return rows;
}
