import { describe, expect, it } from "vitest";
import { isSentinelYear, parseTimestamp, replaceYear } from "../../src/timestamp";

const TEN_AM = Date.UTC(2023, 5, 1, 10, 0, 0);

describe("parseTimestamp", () => {
	it("parses a Z-suffixed timestamp", () => {
		expect(parseTimestamp("2023-06-01T10:00:00Z")).toEqual({ instant: TEN_AM, year: 2023 });
	});

	it("normalises explicit offsets to the same instant", () => {
		expect(parseTimestamp("2023-06-01T12:00:00+02:00")?.instant).toBe(TEN_AM);
		expect(parseTimestamp("2023-06-01T12:00:00+0200")?.instant).toBe(TEN_AM);
		expect(parseTimestamp("2023-06-01T07:30:00-02:30")?.instant).toBe(TEN_AM);
		expect(parseTimestamp("2023-06-01T10:00:00+00:00")?.instant).toBe(TEN_AM);
	});

	it("reads a timestamp without offset as UTC", () => {
		expect(parseTimestamp("2023-06-01T10:00:00")?.instant).toBe(TEN_AM);
		expect(parseTimestamp("2023-06-01 10:00:00")?.instant).toBe(TEN_AM);
		expect(parseTimestamp("2023-06-01T10:00")?.instant).toBe(TEN_AM);
	});

	it("keeps millisecond precision of fractional seconds", () => {
		expect(parseTimestamp("2023-06-01T10:00:00.25Z")?.instant).toBe(TEN_AM + 250);
		expect(parseTimestamp("2023-06-01T10:00:00.123456Z")?.instant).toBe(TEN_AM + 123);
	});

	it("accepts a bare date as midnight UTC", () => {
		expect(parseTimestamp("2023-06-01")?.instant).toBe(Date.UTC(2023, 5, 1));
	});

	it("reports the year as written, not the UTC year", () => {
		const parsed = parseTimestamp("2000-12-31T23:30:00-02:00");
		expect(parsed?.year).toBe(2000);
		expect(parsed?.instant).toBe(Date.UTC(2001, 0, 1, 1, 30));
	});

	it("does not shift two-digit years into the 1900s", () => {
		const parsed = parseTimestamp("0099-01-01T00:00:00Z");
		expect(parsed).not.toBeNull();
		expect(new Date(parsed?.instant ?? 0).getUTCFullYear()).toBe(99);
	});

	it("rejects impossible calendar values", () => {
		expect(parseTimestamp("2023-02-29T00:00:00Z")).toBeNull();
		expect(parseTimestamp("2023-13-01T00:00:00Z")).toBeNull();
		expect(parseTimestamp("2023-06-31T00:00:00Z")).toBeNull();
		expect(parseTimestamp("2023-06-01T24:00:00Z")).toBeNull();
		expect(parseTimestamp("2023-06-01T10:60:00Z")).toBeNull();
		expect(parseTimestamp("2023-06-01T10:00:00+25:00")).toBeNull();
	});

	it("rejects text that is not a timestamp", () => {
		expect(parseTimestamp("")).toBeNull();
		expect(parseTimestamp("yesterday")).toBeNull();
		expect(parseTimestamp("1685613600")).toBeNull();
	});

	it("accepts 29 February only in leap years", () => {
		expect(parseTimestamp("2000-02-29T00:00:00Z")?.year).toBe(2000);
		expect(parseTimestamp("2024-02-29T00:00:00Z")?.instant).toBe(Date.UTC(2024, 1, 29));
		expect(parseTimestamp("1900-02-29T00:00:00Z")).toBeNull();
	});
});

describe("isSentinelYear", () => {
	it("flags only the year 2000", () => {
		expect(isSentinelYear(2000)).toBe(true);
		expect(isSentinelYear(2001)).toBe(false);
		expect(isSentinelYear(1999)).toBe(false);
	});
});

describe("replaceYear", () => {
	it("rewrites only the leading year", () => {
		expect(replaceYear("2000-03-04T05:06:07Z", 2019)).toBe("2019-03-04T05:06:07Z");
		expect(replaceYear("2000-03-04T05:06:07+02:00", 2019)).toBe("2019-03-04T05:06:07+02:00");
	});
});
