import { CellValue } from '../entities/Statement.js';

const separators = /[\s\u00a0\u202f]/g;
const nonNumeric = /[^\d.,+\-]/g;

/**
 * Reads amounts written with space or NBSP thousands separators and a decimal comma,
 * e.g. "5 576 876,37 ₸" or "-1 000,50". Returns null when nothing numeric is left.
 */
export const parseLocaleAmount = (value: CellValue | undefined): number | null => {
  if (value === null || value === undefined || typeof value === 'boolean') {
    return null;
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  let cleaned = value.replace(/\u2212/g, '-').replace(separators, '').replace(nonNumeric, '');

  const commaCount = cleaned.split(',').length - 1;

  if (commaCount === 1 && cleaned.lastIndexOf(',') > cleaned.lastIndexOf('.')) {
    cleaned = cleaned.replace(/\./g, '').replace(',', '.');
  } else {
    cleaned = cleaned.replace(/,/g, '');
  }

  if (!/\d/.test(cleaned)) {
    return null;
  }

  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
};
