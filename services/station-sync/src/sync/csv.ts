import type { Dataset } from './types';

const BOM = '\uFEFF';

function detectDelimiter(headerLine: string): ';' | ',' {
  return headerLine.includes(';') ? ';' : ',';
}

function splitRecords(content: string, delimiter: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let quoted = false;

  for (let index = 0; index < content.length; index += 1) {
    const char = content[index];
    if (quoted) {
      if (char === '"') {
        if (content[index + 1] === '"') {
          field += '"';
          index += 1;
        } else {
          quoted = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"' && field.length === 0) {
      quoted = true;
    } else if (char === delimiter) {
      record.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && content[index + 1] === '\n') {
        index += 1;
      }
      record.push(field);
      records.push(record);
      record = [];
      field = '';
    } else {
      field += char;
    }
  }

  if (field.length > 0 || record.length > 0) {
    record.push(field);
    records.push(record);
  }

  return records.filter((entry) => entry.some((value) => value.trim().length > 0));
}

/**
 * Parses `;` or `,` separated text with a header row. Cells beyond the header
 * are ignored and missing cells read as null.
 */
export function parseDelimited(content: string): Dataset {
  const text = content.startsWith(BOM) ? content.slice(BOM.length) : content;
  const firstLineEnd = text.search(/\r?\n/);
  const headerLine = firstLineEnd >= 0 ? text.slice(0, firstLineEnd) : text;
  const records = splitRecords(text, detectDelimiter(headerLine));
  if (records.length === 0) {
    return { columns: [], rows: [] };
  }

  const columns = records[0].map((entry) => entry.trim());
  const rows = records.slice(1).map((record) => {
    const row: Record<string, string | null> = {};
    columns.forEach((column, index) => {
      const value = record[index];
      row[column] = value === undefined ? null : value.trim();
    });
    return row;
  });

  return { columns, rows };
}
