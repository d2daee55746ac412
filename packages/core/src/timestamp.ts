/** Devices with an unset clock report fixes dated in this year. */
export const SENTINEL_YEAR = 2000;

const ISO_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?(Z|z|[+-]\d{2}(?::?\d{2})?)?)?$/;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

export type ParsedTimestamp = {
	/** epoch milliseconds, UTC */
	instant: number;
	/** calendar year as written, before applying the offset */
	year: number;
};

const isLeapYear = (year: number): boolean => year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0);

const daysInMonth = (year: number, month: number): number => (month === 2 && isLeapYear(year) ? 29 : (DAYS_IN_MONTH[month - 1] ?? 0));

const toInt = (digits: string | undefined): number => (digits === undefined ? 0 : Number.parseInt(digits, 10));

const parseOffsetMinutes = (offset: string | undefined): number | null => {
	if (offset === undefined || offset === "Z" || offset === "z") return 0;
	const sign = offset.startsWith("-") ? -1 : 1;
	const digits = offset.slice(1).replace(":", "");
	const hours = toInt(digits.slice(0, 2));
	const minutes = toInt(digits.slice(2, 4) || undefined);
	if (hours > 23 || minutes > 59) return null;
	return sign * (hours * 60 + minutes);
};

/**
 * Parses the ISO 8601 forms GPX exporters emit. A missing offset is read as UTC.
 * Returns null for anything that is not a real calendar instant.
 */
export const parseTimestamp = (text: string): ParsedTimestamp | null => {
	const m = ISO_PATTERN.exec(text.trim());
	if (!m) return null;

	const year = toInt(m[1]);
	const month = toInt(m[2]);
	const day = toInt(m[3]);
	const hour = toInt(m[4]);
	const minute = toInt(m[5]);
	const second = toInt(m[6]);
	// Date keeps milliseconds only; ordering needs no more than whole seconds.
	const millis = m[7] === undefined ? 0 : toInt(m[7].padEnd(3, "0").slice(0, 3));

	if (month < 1 || month > 12) return null;
	if (day < 1 || day > daysInMonth(year, month)) return null;
	if (hour > 23 || minute > 59 || second > 59) return null;

	const offset = parseOffsetMinutes(m[8]);
	if (offset === null) return null;

	// Date.UTC maps two-digit years into the 1900s, so set the year separately.
	const date = new Date(Date.UTC(2000, month - 1, day, hour, minute, second, millis));
	date.setUTCFullYear(year);

	return { instant: date.getTime() - offset * 60_000, year };
};

export const isSentinelYear = (year: number): boolean => year === SENTINEL_YEAR;

/** Rewrites the leading year of a timestamp text, leaving the rest of its format untouched. */
export const replaceYear = (text: string, year: number): string => text.trim().replace(/^\d{4}/, String(year).padStart(4, "0"));
