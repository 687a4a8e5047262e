import type { IsoDate } from './types.js';

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

const isLeapYear = (year: number): boolean =>
  (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;

const daysInMonth = (year: number, month: number): number => {
  switch (month) {
    case 2:
      return isLeapYear(year) ? 29 : 28;
    case 4:
    case 6:
    case 9:
    case 11:
      return 30;
    default:
      return 31;
  }
};

/**
 * Parses a strict `YYYY-MM-DD` calendar date.
 *
 * Returns null for any other shape and for dates that do not exist
 * (`2021-02-29`, `2021-13-01`). No trimming and no alternative formats.
 */
export const parseIsoDate = (value: string): IsoDate | null => {
  const match = ISO_DATE_RE.exec(value);
  if (match === null) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;

  return value as IsoDate;
};

export const compareIsoDates = (a: IsoDate, b: IsoDate): number => {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
};
