import { type DateRange, type IdentityKey, type TrackPoint, identityKey } from "@gpx-timeline/schema";
import { dedupeByKey } from "./utils";

export type ConsolidationStats = {
	input: number;
	duplicates: number;
	unique: number;
};

export type Consolidation = {
	points: TrackPoint[];
	stats: ConsolidationStats;
};

/** Two points with the same key are the same fix, whatever else differs. */
export const identityKeyOf = (point: TrackPoint): IdentityKey => identityKey(JSON.stringify([point.lat, point.lon, point.time]));

const compareTimestampAsc = (a: TrackPoint, b: TrackPoint): number => a.timestamp - b.timestamp;

/**
 * Folds an existing timeline and any number of new point lists into one
 * chronological sequence. The first occurrence of each identity key wins;
 * the sort is stable, so equal instants keep their concatenation order.
 */
export const consolidate = (existing: Iterable<TrackPoint>, incoming: readonly Iterable<TrackPoint>[] = []): Consolidation => {
	const all: TrackPoint[] = [...existing, ...incoming.flatMap(list => [...list])];
	const { unique, duplicates } = dedupeByKey(all, identityKeyOf);
	const points = unique.sort(compareTimestampAsc);

	return {
		points,
		stats: { input: all.length, duplicates, unique: points.length },
	};
};

export const dateRange = (points: readonly TrackPoint[]): DateRange | null => {
	if (points.length === 0) return null;
	const bounds = points.reduce((acc, p) => ({ min: Math.min(acc.min, p.timestamp), max: Math.max(acc.max, p.timestamp) }), { min: Number.POSITIVE_INFINITY, max: Number.NEGATIVE_INFINITY });
	return {
		first: new Date(bounds.min).toISOString(),
		last: new Date(bounds.max).toISOString(),
	};
};
