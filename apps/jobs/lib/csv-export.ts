/**
 * CSV Export Utility
 *
 * Converts an array of objects to CSV format and writes it to disk.
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * Escape a CSV field value (handles commas, quotes, and newlines)
 */
export function escapeCsvField(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }

  const stringValue = String(value);

  // If the value contains comma, quote, or newline, wrap it in quotes and escape internal quotes
  if (stringValue.includes(',') || stringValue.includes('"') || stringValue.includes('\n')) {
    return `"${stringValue.replace(/"/g, '""')}"`;
  }

  return stringValue;
}

/**
 * Convert an array of objects to a CSV string, one column per header
 */
export function arrayToCsv<T extends object>(
  rows: readonly T[],
  headers: readonly (keyof T & string)[],
  format: (value: unknown) => unknown = v => v
): string {
  if (rows.length === 0) {
    return '';
  }

  const csvRows = [
    headers.map(escapeCsvField).join(','),
    ...rows.map(row => headers.map(header => escapeCsvField(format(row[header]))).join(',')),
  ];

  return csvRows.join('\n');
}

/**
 * Write rows as a CSV file, creating the parent directory if needed.
 * Returns false (and writes nothing) when there are no rows.
 */
export function writeCsv<T extends object>(
  filename: string,
  rows: readonly T[],
  headers: readonly (keyof T & string)[],
  format?: (value: unknown) => unknown
): boolean {
  if (rows.length === 0) {
    console.warn('No data to export');
    return false;
  }

  const filePath = filename.endsWith('.csv') ? filename : `${filename}.csv`;
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, arrayToCsv(rows, headers, format) + '\n', 'utf8');
  return true;
}
