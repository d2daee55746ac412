export { type Consolidation, type ConsolidationStats, consolidate, dateRange, identityKeyOf } from "./combiner";
export { type Extraction, type ExtractOptions, type ExtractWarning, extractTrackPoints } from "./extractor";
export { GPX_EXTENSION, TIMELINE_SUFFIX, groupSources, makeGroupKey, parseSourceFilename, parseStoragePath, timelineFilename } from "./grouper";
export { foldKey, stripAccents } from "./normalizer";
export { DEFAULT_CREATOR, type TimelineHeader, escapeXml, serializeTimeline } from "./serializer";
export { type ParsedTimestamp, SENTINEL_YEAR, isSentinelYear, parseTimestamp, replaceYear } from "./timestamp";
export type {
	BatchSummary,
	DateRange,
	DropReason,
	GroupOutcome,
	SentinelPolicy,
	SourceGroup,
	SourceIdentity,
	StorageIdentity,
	TrackExtensions,
	TrackPoint,
	TrackPointSequence,
} from "@gpx-timeline/schema";
export type { Result } from "./utils";
export { asArray, collect, dedupeByKey, err, errorMessage, formatUtcSeconds, match, ok, tryCatch, tryCatchAsync, unwrap, unwrapErr, unwrapOr } from "./utils";
