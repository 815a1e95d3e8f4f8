export type CsvCell = string | number | boolean | null | undefined;

function escapeCell(value: CsvCell): string {
  if (value === null || value === undefined) {
    return "";
  }
  const text = String(value);
  if (/[",\r\n]/.test(text) || text !== text.trim()) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/** Serialises rows with a header line; `\n` line endings and a trailing newline. */
export function toCsv(headers: readonly string[], rows: readonly (readonly CsvCell[])[]): string {
  const lines = [headers.map(escapeCell).join(",")];
  for (const row of rows) {
    lines.push(row.map(escapeCell).join(","));
  }
  return `${lines.join("\n")}\n`;
}

/**
 * Parses CSV text into rows of raw cells. Handles quoted cells with embedded
 * commas, doubled quotes and line breaks, CRLF line endings and a leading
 * byte-order mark. Fully blank lines are dropped.
 */
export function parseCsv(text: string): string[][] {
  const source = text.startsWith("\uFEFF") ? text.slice(1) : text;
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = "";
  let quoted = false;
  let index = 0;

  const endRow = (): void => {
    row.push(cell);
    cell = "";
    if (row.some((value) => value.trim() !== "")) {
      rows.push(row);
    }
    row = [];
  };

  while (index < source.length) {
    const char = source[index];
    if (quoted) {
      if (char === '"') {
        if (source[index + 1] === '"') {
          cell += '"';
          index += 2;
          continue;
        }
        quoted = false;
      } else {
        cell += char;
      }
      index++;
      continue;
    }

    if (char === '"' && cell.trim() === "") {
      cell = "";
      quoted = true;
    } else if (char === ",") {
      row.push(cell);
      cell = "";
    } else if (char === "\n" || char === "\r") {
      endRow();
      if (char === "\r" && source[index + 1] === "\n") {
        index++;
      }
    } else {
      cell += char;
    }
    index++;
  }

  if (cell !== "" || row.length > 0) {
    endRow();
  }
  return rows;
}

/** Parses CSV with a header line into objects keyed by trimmed header names. */
export function parseCsvRecords(text: string): { headers: string[]; records: Record<string, string>[] } {
  const [headerRow, ...body] = parseCsv(text);
  if (!headerRow) {
    return { headers: [], records: [] };
  }
  const headers = headerRow.map((header) => header.trim());
  const records = body.map((cells) => {
    const record: Record<string, string> = {};
    headers.forEach((header, column) => {
      record[header] = cells[column] ?? "";
    });
    return record;
  });
  return { headers, records };
}
