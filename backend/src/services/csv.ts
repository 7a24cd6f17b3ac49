// ═══════════════════════════════════════════════════════
// csv.ts — RFC 4180 reader/writer for sheet exports
// ═══════════════════════════════════════════════════════

export type CsvRecord = Record<string, string>;
export type CsvCell = string | number | null | undefined;

/** Split CSV text into rows of cells. Handles quoted fields, "" escapes, CRLF and a BOM. */
export function parseCsv(content: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = '';
  let inQuotes = false;
  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;

  for (let i = 0; i < text.length; i += 1) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"' && text[i + 1] === '"') {
        cell += '"';
        i += 1;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        cell += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      row.push(cell);
      cell = '';
    } else if (ch === '\n') {
      row.push(cell);
      rows.push(row);
      row = [];
      cell = '';
    } else if (ch !== '\r') {
      cell += ch;
    }
  }

  if (cell.length > 0 || row.length > 0) {
    row.push(cell);
    rows.push(row);
  }
  return rows;
}

/** Rows → header-keyed records; fully blank lines are dropped. */
export function toRecords(rows: string[][]): CsvRecord[] {
  const [header, ...body] = rows;
  if (!header) return [];
  const keys = header.map(h => h.trim());
  return body
    .filter(row => row.some(cell => cell.trim() !== ''))
    .map(row => {
      const record: CsvRecord = {};
      keys.forEach((key, c) => { record[key] = (row[c] ?? '').trim(); });
      return record;
    });
}

function escapeCell(value: CsvCell): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'number' && !Number.isFinite(value)) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** Serialize a header and rows, CRLF line endings per RFC 4180. */
export function stringifyCsv(header: readonly string[], rows: readonly (readonly CsvCell[])[]): string {
  return [header, ...rows].map(r => r.map(escapeCell).join(',')).join('\r\n') + '\r\n';
}
