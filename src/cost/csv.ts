/**
 * Minimal CSV reader for the pricing table.
 * Handles quoted fields (with embedded commas, line breaks and "" escapes),
 * LF and CRLF line endings, and skips blank lines.
 */

/** Returns true for a record produced by an empty line */
function isBlankRecord(record: string[]): boolean {
  return record.length === 1 && record[0] === '';
}

/**
 * Split a CSV document into records of trimmed fields.
 * @param text - The raw CSV document
 * @returns One string array per non-blank record, in document order
 */
export function parseCsv(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;

  const endRecord = (): void => {
    record.push(field.trim());
    field = '';
    if (!isBlankRecord(record)) {
      records.push(record);
    }
    record = [];
  };

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"' && text[i + 1] === '"') {
        field += '"';
        i++;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      record.push(field.trim());
      field = '';
    } else if (char === '\n') {
      endRecord();
    } else if (char === '\r') {
      if (text[i + 1] === '\n') {
        i++;
      }
      endRecord();
    } else {
      field += char;
    }
  }

  if (field.length > 0 || record.length > 0) {
    endRecord();
  }

  return records;
}
