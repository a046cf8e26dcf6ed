import { appendFileSync, closeSync, existsSync, openSync, readSync } from 'fs';
import type { ProductRecord } from './types';
import { loggerFor, type Logger } from './reliability';

export const CSV_COLUMNS = ['Date', 'Category', 'Product Name', 'Price', 'Ounces'] as const;

const COLUMN_FIELDS: Record<(typeof CSV_COLUMNS)[number], keyof ProductRecord> = {
  Date: 'date',
  Category: 'category',
  'Product Name': 'productName',
  Price: 'price',
  Ounces: 'ounces',
};

export const HEADER_SAMPLE_BYTES = 1024;

function escapeCSVValue(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Split the first line of CSV text into fields, honouring quoted values.
 */
export function parseCsvLine(text: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"' && text[i + 1] === '"') {
        current += '"';
        i++;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        current += char;
      }
    } else if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      fields.push(current);
      current = '';
    } else if (char === '\n' || char === '\r') {
      break;
    } else {
      current += char;
    }
  }

  fields.push(current);
  return fields;
}

/**
 * Decide whether a leading file sample already starts with our header row.
 */
export function hasHeader(sample: string): boolean {
  const text = sample.replace(/^\uFEFF/, '');
  if (text.trim() === '') {
    return false;
  }

  const fields = parseCsvLine(text).map((field) => field.trim().toLowerCase());
  return (
    fields.length === CSV_COLUMNS.length &&
    CSV_COLUMNS.every((column, index) => fields[index] === column.toLowerCase())
  );
}

/**
 * Read up to the first 1KB of a file; a missing file reads as empty.
 */
export function readHeaderSample(filename: string): string {
  if (!existsSync(filename)) {
    return '';
  }

  const fd = openSync(filename, 'r');
  try {
    const buffer = Buffer.alloc(HEADER_SAMPLE_BYTES);
    const bytesRead = readSync(fd, buffer, 0, HEADER_SAMPLE_BYTES, 0);
    return buffer.subarray(0, bytesRead).toString('utf-8');
  } finally {
    closeSync(fd);
  }
}

export function formatCsvRows(records: ProductRecord[], includeHeader: boolean): string {
  const lines: string[] = includeHeader ? [CSV_COLUMNS.join(',')] : [];

  for (const record of records) {
    const values = CSV_COLUMNS.map((column) => escapeCSVValue(record[COLUMN_FIELDS[column]]));
    lines.push(values.join(','));
  }

  return lines.map((line) => `${line}\n`).join('');
}

/**
 * Append records to a CSV file, writing the header first unless the file
 * already starts with one. Write errors are not caught.
 */
export function appendToCsv(
  records: ProductRecord[],
  filename: string,
  logger: Logger = loggerFor('CsvExport')
): number {
  if (records.length === 0) {
    logger.info('No data to append to CSV');
    return 0;
  }

  const headerPresent = hasHeader(readHeaderSample(filename));
  appendFileSync(filename, formatCsvRows(records, !headerPresent), 'utf-8');

  logger.info(`Data appended to ${filename}`, { rows: records.length, headerWritten: !headerPresent });
  return records.length;
}
