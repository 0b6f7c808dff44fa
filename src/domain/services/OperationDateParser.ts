import dayjs from 'dayjs';
import { CellValue } from '../entities/Statement.js';

// Year-first only at the start of the cell; day-first never starts inside a longer number.
const yearFirstPattern = /^(\d{4})[-./](\d{1,2})[-./](\d{1,2})(?!\d)/;
const dayFirstPattern = /(?<!\d)(\d{1,2})[./](\d{1,2})[./](\d{4}|\d{2})(?!\d)/;

const toIsoDate = (year: number, month: number, day: number): string | null => {
  const candidate = `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
  const parsed = dayjs(candidate);

  // dayjs rolls 2024-02-31 over into March; a rolled date is not the one written
  if (!parsed.isValid() || parsed.format('YYYY-MM-DD') !== candidate) {
    return null;
  }

  return candidate;
};

const expandYear = (raw: string): number => {
  const year = Number(raw);
  if (raw.length === 4) {
    return year;
  }
  return year <= 68 ? 2000 + year : 1900 + year;
};

/**
 * Day-first operation date parsing: "15.03.2024", "15.03.24 10:41", "15/03/2024".
 * A leading four-digit year reads year first: "2024-03-15T10:41:00Z", "2024/03/15", "2024.03.15".
 * Anything else yields null and the row is treated as undated.
 */
export const parseOperationDate = (value: CellValue | undefined): string | null => {
  if (typeof value !== 'string') {
    return null;
  }

  const text = value.trim();
  if (!text) {
    return null;
  }

  const yearFirst = yearFirstPattern.exec(text);
  if (yearFirst) {
    return toIsoDate(Number(yearFirst[1]), Number(yearFirst[2]), Number(yearFirst[3]));
  }

  const dayFirst = dayFirstPattern.exec(text);
  if (dayFirst) {
    return toIsoDate(expandYear(dayFirst[3]), Number(dayFirst[2]), Number(dayFirst[1]));
  }

  return null;
};
