import { InvalidDateError } from '../utils/errors.js';

const FULL_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const YEAR_ONLY = /^\d{4}$/;

/**
 * True when year/month/day name an existing calendar day.
 */
function isCalendarDate(year: number, month: number, day: number): boolean {
    if (month < 1 || month > 12 || day < 1) return false;
    const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
    return day <= daysInMonth;
}

/**
 * Normalize a citation's raw date to `YYYY-MM-DD`.
 *
 * - `YYYY-MM-DD` (a real calendar date) is kept as is
 * - `YYYY` becomes `YYYY-01-01`
 * - anything else, including `YYYY-MM`, is unparseable and yields null
 *
 * Normalized dates are zero-padded ISO strings, so they compare correctly as strings.
 */
export function normalizeCitationDate(value: string | null | undefined): string | null {
    if (!value) return null;
    const trimmed = value.trim();

    if (YEAR_ONLY.test(trimmed)) {
        return `${trimmed}-01-01`;
    }

    const match = FULL_DATE.exec(trimmed);
    if (!match) return null;

    const [, year, month, day] = match;
    if (!isCalendarDate(Number(year), Number(month), Number(day))) return null;
    return trimmed;
}

/**
 * Parse a cutoff date. Only strict `YYYY-MM-DD` is accepted.
 * @throws InvalidDateError
 */
export function parseCutoffDate(value: string): string {
    const trimmed = value.trim();
    const match = FULL_DATE.exec(trimmed);
    if (!match || !isCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]))) {
        throw new InvalidDateError(value);
    }
    return trimmed;
}

/**
 * Today's date as `YYYY-MM-DD` in UTC.
 */
export function todayIso(now: Date = new Date()): string {
    return now.toISOString().slice(0, 10);
}
