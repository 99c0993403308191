/**
 * CSV Codec
 *
 * RFC 4180 reading and writing for deck files.
 *
 * Handles:
 * - Quoted fields with embedded delimiters
 * - Escaped quotes (doubled: "")
 * - Newlines within quoted fields
 * - CRLF and LF line endings
 * - UTF-8 BOM
 */

export type CsvParseResult =
  | { success: true; rows: string[][] }
  | { success: false; error: string };

const DELIMITER = ",";

/**
 * Parse CSV content into rows of fields.
 * Blank lines are dropped.
 */
export function parseCsv(content: string): CsvParseResult {
  const rows: string[][] = [];

  // Strip UTF-8 BOM if present
  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;

  let row: string[] = [];
  let field = "";
  let inQuotes = false;
  let quotedField = false;
  let i = 0;

  const endRow = () => {
    row.push(field);
    if (row.length > 1 || row[0] !== "" || quotedField) {
      rows.push(row);
    }
    row = [];
    field = "";
    quotedField = false;
  };

  while (i < text.length) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        // Check for escaped quote (doubled)
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        // End of quoted field
        inQuotes = false;
      } else {
        field += char;
      }
    } else if (char === '"') {
      inQuotes = true;
      quotedField = true;
    } else if (char === DELIMITER) {
      row.push(field);
      field = "";
    } else if (char === "\r" && text[i + 1] === "\n") {
      endRow();
      i++; // Skip the \n
    } else if (char === "\n") {
      endRow();
    } else {
      field += char;
    }
    i++;
  }

  if (inQuotes) {
    return { success: false, error: "Unclosed quote detected. The file may be malformed." };
  }

  // Handle final field/row (file may not end with newline)
  if (field || row.length > 0 || quotedField) {
    endRow();
  }

  return { success: true, rows };
}

/**
 * Quote a field when it contains a delimiter, quote or line break.
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Serialize rows to CSV with LF line endings and a trailing newline.
 */
export function serializeCsv(rows: readonly (readonly string[])[]): string {
  return rows.map((row) => row.map(escapeCsvField).join(DELIMITER)).join("\n") + "\n";
}
