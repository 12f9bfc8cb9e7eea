import Papa from 'papaparse';
import type { ParseError } from 'papaparse';

export type CsvRecord = Record<string, string>;

export interface CsvParseResult<T> {
  rows: T[];
  errors: string[];
}

const stripBom = (text: string): string => (text.charCodeAt(0) === 0xfeff ? text.slice(1) : text);

const describeErrors = (errors: ParseError[]): string[] =>
  errors.map((error) => `${error.code}${error.row === undefined ? '' : ` at row ${error.row}`}: ${error.message}`);

export const parseCsvRecords = (text: string): CsvParseResult<CsvRecord> => {
  const result = Papa.parse<CsvRecord>(stripBom(text), {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim()
  });
  return { rows: result.data, errors: describeErrors(result.errors) };
};

export const parseCsvMatrix = (text: string): CsvParseResult<string[]> => {
  const result = Papa.parse<string[]>(stripBom(text), {
    header: false,
    skipEmptyLines: true
  });
  return { rows: result.data, errors: describeErrors(result.errors) };
};
