/**
 * Parses due-date cells into epoch milliseconds (UTC).
 * Supports: YYYY-MM-DD (optionally with a time), YYYY/MM/DD, MM/DD/YYYY,
 * DD/MM/YYYY, and month-name forms such as "May 1, 2025" or "1 May 2025".
 *
 * Precedence is fixed: year-first, then month-first, then day-first, then
 * month names. "01/05/2025" is therefore January 5th, and "25/12/2025" falls
 * through to day-first because 25 is not a month.
 */

const ISO_RE = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2}))?Z?)?$/;
const YEAR_FIRST_RE = /^(\d{4})[/.](\d{1,2})[/.](\d{1,2})$/;
const YEAR_LAST_RE = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})$/;
const MONTH_NAME_FIRST_RE = /^([a-z]+)\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})$/;
const DAY_FIRST_NAME_RE = /^(\d{1,2})(?:st|nd|rd|th)?\s+([a-z]+)\.?,?\s+(\d{4})$/;

const MONTH_MAP = new Map<string, number>([
  ["jan", 1], ["feb", 2], ["mar", 3], ["apr", 4],
  ["may", 5], ["jun", 6], ["jul", 7], ["aug", 8],
  ["sep", 9], ["sept", 9], ["oct", 10], ["nov", 11], ["dec", 12],
  ["january", 1], ["february", 2], ["march", 3], ["april", 4],
  ["june", 6], ["july", 7], ["august", 8], ["september", 9],
  ["october", 10], ["november", 11], ["december", 12],
]);

/** Epoch ms for a calendar date at UTC, or null when the date does not exist (e.g. Feb 30). */
function utc(
  year: number,
  month: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0,
): number | null {
  if (month < 1 || month > 12 || day < 1) return null;
  if (hours > 23 || minutes > 59 || seconds > 59) return null;
  // setUTCFullYear keeps years 0-99 literal; Date.UTC would shift them to 19xx.
  const d = new Date(0);
  d.setUTCFullYear(year, month - 1, day);
  d.setUTCHours(hours, minutes, seconds, 0);
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    return null;
  }
  return d.getTime();
}

function tryIso(input: string): number | null {
  const m = ISO_RE.exec(input);
  if (!m) return null;
  const [, y, mo, d, h, mi, s] = m;
  return utc(
    Number(y),
    Number(mo),
    Number(d),
    h ? Number(h) : 0,
    mi ? Number(mi) : 0,
    s ? Number(s) : 0,
  );
}

function tryYearFirst(input: string): number | null {
  const m = YEAR_FIRST_RE.exec(input);
  if (!m) return null;
  return utc(Number(m[1]), Number(m[2]), Number(m[3]));
}

function tryYearLast(input: string): number | null {
  const m = YEAR_LAST_RE.exec(input);
  if (!m) return null;
  const first = Number(m[1]);
  const second = Number(m[2]);
  const year = Number(m[3]);
  // Month-first wins; day-first only when that is not a real date.
  return utc(year, first, second) ?? utc(year, second, first);
}

function tryMonthName(input: string): number | null {
  const lower = input.toLowerCase();

  let m = MONTH_NAME_FIRST_RE.exec(lower);
  if (m) {
    const month = MONTH_MAP.get(m[1]);
    return month ? utc(Number(m[3]), month, Number(m[2])) : null;
  }

  m = DAY_FIRST_NAME_RE.exec(lower);
  if (m) {
    const month = MONTH_MAP.get(m[2]);
    return month ? utc(Number(m[3]), month, Number(m[1])) : null;
  }

  return null;
}

const PARSERS = [tryIso, tryYearFirst, tryYearLast, tryMonthName];

/** Parse a date cell. Returns null for empty, absent, or unrecognised input. */
export function parseDate(text: string | null | undefined): number | null {
  if (!text) return null;
  const input = text.trim();
  if (!input) return null;

  for (const parse of PARSERS) {
    const result = parse(input);
    if (result !== null) return result;
  }
  return null;
}
