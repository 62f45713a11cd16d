export type CsvTable = {
  headers: string[];
  rows: string[][];
  delimiter: string;
};

const CANDIDATE_DELIMITERS = [',', '\t', ';'];

/** Picks the candidate that splits the header line into the most fields, ignoring quoted text. */
export function detectDelimiter(headerLine: string): string {
  let best = CANDIDATE_DELIMITERS[0];
  let bestCount = -1;
  for (const delimiter of CANDIDATE_DELIMITERS) {
    let count = 0;
    let inQuotes = false;
    for (const ch of headerLine) {
      if (ch === '"') {
        inQuotes = !inQuotes;
      } else if (!inQuotes && ch === delimiter) {
        count += 1;
      }
    }
    if (count > bestCount) {
      bestCount = count;
      best = delimiter;
    }
  }
  return best;
}

function isBlankRow(row: string[]): boolean {
  return row.every((value) => value.trim() === '');
}

/**
 * RFC 4180-style parsing of a spreadsheet export: quoted fields may hold
 * delimiters, newlines and doubled quotes; CRLF and LF both end a record;
 * blank records are dropped. The first record becomes the trimmed headers.
 */
export function parseCsv(text: string): CsvTable {
  const source = text.replace(/^\uFEFF/, '');
  const firstBreak = source.search(/\r?\n/);
  const delimiter = detectDelimiter(firstBreak >= 0 ? source.slice(0, firstBreak) : source);

  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;

  const endField = () => {
    record.push(field);
    field = '';
  };
  const endRecord = () => {
    endField();
    if (!isBlankRow(record)) {
      records.push(record);
    }
    record = [];
  };

  for (let i = 0; i < source.length; i += 1) {
    const ch = source[i];
    if (inQuotes) {
      if (ch !== '"') {
        field += ch;
      } else if (source[i + 1] === '"') {
        field += '"';
        i += 1;
      } else {
        inQuotes = false;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === delimiter) {
      endField();
    } else if (ch === '\n') {
      endRecord();
    } else if (ch !== '\r') {
      field += ch;
    }
  }
  if (field.length > 0 || record.length > 0) {
    endRecord();
  }

  const [headerRecord, ...rows] = records;
  return {
    headers: (headerRecord ?? []).map((header) => header.trim()),
    rows,
    delimiter
  };
}

/** "Economic Year" -> "economicyear"; used to match headers loosely. */
export function normalizeHeader(header: string): string {
  return header
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]/g, '');
}
