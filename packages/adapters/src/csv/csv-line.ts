/**
 * Split one CSV line into fields. Supports double-quoted fields with embedded
 * commas and doubled quotes (`""`). Returns null when a quoted field is left
 * unterminated.
 */
export function splitCsvLine(line: string): string[] | null {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inQuotes) {
      if (ch === '"') {
        if (line[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += ch;
      }
    } else if (ch === '"' && current.length === 0) {
      inQuotes = true;
    } else if (ch === ',') {
      fields.push(current);
      current = '';
    } else {
      current += ch;
    }
  }

  if (inQuotes) return null;
  fields.push(current);
  return fields;
}

const BOM = '\uFEFF';

export function stripBom(line: string): string {
  return line.startsWith(BOM) ? line.slice(1) : line;
}

/** Map a header and a field list onto a row dictionary. */
export function toRow(header: readonly string[], fields: readonly string[]): Record<string, string> {
  const row: Record<string, string> = {};
  header.forEach((name, i) => {
    row[name] = fields[i] ?? '';
  });
  return row;
}
