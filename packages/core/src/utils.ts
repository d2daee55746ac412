import { err, ok, type Result } from "@gpx-timeline/schema";

export { err, ok, type Result };

// ============================================================================
// Core Operations
// ============================================================================

export const match = <T, E, R>(result: Result<T, E>, onOk: (value: T) => R, onErr: (error: E) => R): R => {
	if (result.ok) {
		return onOk(result.value);
	}
	return onErr(result.error);
};

export const unwrapOr = <T, E>(result: Result<T, E>, defaultValue: T): T => (result.ok ? result.value : defaultValue);

export const collect = <T, E>(results: Result<T, E>[]): Result<T[], E> => {
	const values: T[] = [];
	for (const r of results) {
		if (!r.ok) return err(r.error);
		values.push(r.value);
	}
	return ok(values);
};

// ============================================================================
// Try/Catch Wrappers
// ============================================================================

export const tryCatch = <T, E>(fn: () => T, onError: (e: unknown) => E): Result<T, E> => {
	try {
		return ok(fn());
	} catch (e) {
		return err(onError(e));
	}
};

export const tryCatchAsync = async <T, E>(fn: () => Promise<T>, onError: (e: unknown) => E): Promise<Result<T, E>> => {
	try {
		return ok(await fn());
	} catch (e) {
		return err(onError(e));
	}
};

export const errorMessage = (e: unknown): string => (e instanceof Error ? e.message : String(e));

// ============================================================================
// Collection Utilities
// ============================================================================

export const asArray = <T>(value: T | T[] | undefined | null): T[] => {
	if (value === undefined || value === null) return [];
	return Array.isArray(value) ? value : [value];
};

/**
 * Keeps the first item for every key, in input order.
 * Returns the survivors and how many later items were dropped.
 */
export const dedupeByKey = <T>(items: Iterable<T>, getKey: (item: T) => string): { unique: T[]; duplicates: number } => {
	const seen = new Set<string>();
	const unique: T[] = [];
	let duplicates = 0;

	for (const item of items) {
		const key = getKey(item);
		if (seen.has(key)) {
			duplicates++;
			continue;
		}
		seen.add(key);
		unique.push(item);
	}

	return { unique, duplicates };
};

// ============================================================================
// Date/Time Utilities
// ============================================================================

/** `YYYY-MM-DDTHH:MM:SSZ`, the precision GPX metadata carries. */
export const formatUtcSeconds = (date: Date): string => `${date.toISOString().slice(0, 19)}Z`;

// ============================================================================
// Testing Utilities
// ============================================================================

/** Unwrap a Result, throwing if it's an error. Useful for tests. */
export const unwrap = <T, E>(result: Result<T, E>): T => {
	if (!result.ok) throw new Error(`Unwrap called on error result: ${JSON.stringify(result.error)}`);
	return result.value;
};

/** Unwrap an error from a Result, throwing if it's ok. Useful for tests. */
export const unwrapErr = <T, E>(result: Result<T, E>): E => {
	if (result.ok) throw new Error(`unwrapErr called on ok result: ${JSON.stringify(result.value)}`);
	return result.error;
};
