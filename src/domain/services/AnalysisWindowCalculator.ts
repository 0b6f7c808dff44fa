import dayjs from 'dayjs';
import { AnalysisWindow } from '../entities/AnalysisWindow.js';

const ISO_DATE = 'YYYY-MM-DD';

/**
 * Last twelve full calendar months before the anchor's month.
 * The anchor's own month is never part of the window, even when the anchor is its last day.
 */
export const computeWindow = (anchor: string | Date): AnalysisWindow => {
  const anchorDate = dayjs(anchor);

  if (!anchorDate.isValid()) {
    throw new RangeError(`Invalid anchor date: ${String(anchor)}`);
  }

  const end = anchorDate.startOf('month').subtract(1, 'day');
  const start = end.startOf('month').subtract(11, 'month');

  return {
    start: start.format(ISO_DATE),
    end: end.format(ISO_DATE),
  };
};

export const isWithinWindow = (isoDate: string, window: AnalysisWindow): boolean =>
  isoDate >= window.start && isoDate <= window.end;
