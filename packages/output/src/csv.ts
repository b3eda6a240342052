const NEEDS_QUOTES = /[",\r\n]/;
const LINE_BREAK = '\r\n';

/**
 * Render one cell. Arrays and objects become JSON; absent values an empty
 * cell. Quoting follows RFC 4180.
 */
export function encodeCsvField(value: unknown): string {
  let text: string;
  if (value === undefined || value === null) {
    text = '';
  } else if (value instanceof Date) {
    text = value.toISOString();
  } else if (typeof value === 'object') {
    text = JSON.stringify(value);
  } else {
    text = String(value);
  }

  return NEEDS_QUOTES.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function encodeCsvRow(values: readonly unknown[]): string {
  return values.map(encodeCsvField).join(',');
}

export function encodeCsv(header: readonly string[], rows: readonly (readonly unknown[])[]): string {
  return [header, ...rows].map((row) => `${encodeCsvRow(row)}${LINE_BREAK}`).join('');
}

/**
 * Header is the sorted union of `baseColumns` and the keys that hold a value
 * in any record, so an empty record list still gets a full header.
 */
export function encodeRecordsCsv(
  records: readonly Record<string, unknown>[],
  baseColumns: readonly string[] = [],
): string {
  const columns = new Set<string>(baseColumns);
  for (const record of records) {
    for (const [key, value] of Object.entries(record)) {
      if (value !== undefined && value !== null) {
        columns.add(key);
      }
    }
  }

  const header = [...columns].sort();
  return encodeCsv(
    header,
    records.map((record) => header.map((column) => record[column])),
  );
}
