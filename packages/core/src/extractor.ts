import { type DropReason, EXTENSION_FIELDS, type ExtensionField, type SentinelPolicy, type TrackExtensions, type TrackPoint, type TrackPointSequence } from "@gpx-timeline/schema";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { z } from "zod";
import { isSentinelYear, parseTimestamp, replaceYear } from "./timestamp";
import { asArray } from "./utils";

export type ExtractWarning = { kind: "malformed_document"; message: string };

export type Extraction = {
	points: TrackPointSequence;
	warning: ExtractWarning | null;
};

export type ExtractOptions = {
	sentinel?: SentinelPolicy;
	/** Called for every discarded point, on each iteration of the sequence. */
	onDrop?: (reason: DropReason, raw: unknown) => void;
};

type PointRead = { kind: "point"; point: TrackPoint } | { kind: "dropped"; reason: DropReason };

// === RAW NODE ACCESS ===

const parser = new XMLParser({
	ignoreAttributes: false,
	attributeNamePrefix: "@_",
	removeNSPrefix: true,
	parseTagValue: false,
	parseAttributeValue: false,
	trimValues: true,
	// Also decodes numeric character references such as &#233;.
	htmlEntities: true,
});

const NodeSchema = z.record(z.unknown());

const firstOf = (value: unknown): unknown => (Array.isArray(value) ? value[0] : value);

const NodeTextSchema = z.preprocess(firstOf, z.union([z.string(), z.object({ "#text": z.string() })]).transform(node => (typeof node === "string" ? node : node["#text"])));

const textOf = (value: unknown): string | undefined => {
	const parsed = NodeTextSchema.safeParse(value);
	return parsed.success && parsed.data.length > 0 ? parsed.data : undefined;
};

const childrenOf = (node: unknown, name: string): unknown[] => {
	const parsed = NodeSchema.safeParse(node);
	return parsed.success ? asArray(parsed.data[name]) : [];
};

const fieldsOf = (node: unknown): Record<string, unknown> => {
	const parsed = NodeSchema.safeParse(node);
	return parsed.success ? parsed.data : {};
};

// === POINT CONVERSION ===

const readExtensions = (raw: unknown): TrackExtensions | null => {
	const node = firstOf(raw);
	if (node === undefined) return null;

	const fields = fieldsOf(node);
	const extensions: Partial<Record<ExtensionField, string>> = {};
	for (const field of EXTENSION_FIELDS) {
		const value = textOf(fields[field]);
		if (value !== undefined) extensions[field] = value;
	}
	return extensions;
};

const resolveTime = (time: string, policy: SentinelPolicy): { time: string; timestamp: number } | DropReason => {
	const parsed = parseTimestamp(time);
	if (!parsed) return "unparseable_time";
	if (!isSentinelYear(parsed.year)) return { time, timestamp: parsed.instant };
	if (policy.mode === "drop") return "sentinel";

	const repaired = replaceYear(time, policy.year);
	const reparsed = parseTimestamp(repaired);
	// 29 February has no counterpart in most years.
	if (!reparsed) return "sentinel";
	return { time: repaired, timestamp: reparsed.instant };
};

const readPoint = (raw: unknown, policy: SentinelPolicy): PointRead => {
	const fields = fieldsOf(raw);
	const lat = textOf(fields["@_lat"]);
	const lon = textOf(fields["@_lon"]);
	if (lat === undefined || lon === undefined) return { kind: "dropped", reason: "missing_coordinates" };

	const time = textOf(fields.time);
	if (time === undefined) return { kind: "dropped", reason: "missing_time" };

	const resolved = resolveTime(time, policy);
	if (typeof resolved === "string") return { kind: "dropped", reason: resolved };

	const elevation = textOf(fields.ele);
	const satellite_count = textOf(fields.sat);

	const point: TrackPoint = {
		lat,
		lon,
		time: resolved.time,
		timestamp: resolved.timestamp,
		...(elevation !== undefined && { elevation }),
		...(satellite_count !== undefined && { satellite_count }),
		extensions: readExtensions(fields.extensions),
	};
	return { kind: "point", point };
};

function* readPoints(rawPoints: readonly unknown[], options: ExtractOptions): Generator<TrackPoint> {
	const policy: SentinelPolicy = options.sentinel ?? { mode: "drop" };
	for (const raw of rawPoints) {
		const read = readPoint(raw, policy);
		if (read.kind === "point") {
			yield read.point;
		} else {
			options.onDrop?.(read.reason, raw);
		}
	}
}

const sequenceOf = (rawPoints: readonly unknown[], options: ExtractOptions): TrackPointSequence => ({
	[Symbol.iterator]: () => readPoints(rawPoints, options),
});

const unreadable = (message: string): Extraction => ({
	points: sequenceOf([], {}),
	warning: { kind: "malformed_document", message },
});

// === PUBLIC API ===

/**
 * Reads every `trk/trkseg/trkpt` of a GPX document in document order.
 * Element names match with or without a namespace prefix. A document that
 * cannot be read produces an empty sequence and a warning instead of throwing.
 */
export const extractTrackPoints = (xml: string, options: ExtractOptions = {}): Extraction => {
	if (xml.trim().length === 0) return unreadable("Document is empty");

	const validation = XMLValidator.validate(xml);
	if (validation !== true) {
		return unreadable(`${validation.err.msg} (line ${validation.err.line}, column ${validation.err.col})`);
	}

	const document = fieldsOf(parser.parse(xml));
	if (!("gpx" in document)) return unreadable("Missing <gpx> root element");

	const rawPoints = childrenOf(document.gpx, "trk")
		.flatMap(trk => childrenOf(trk, "trkseg"))
		.flatMap(segment => childrenOf(segment, "trkpt"));

	return { points: sequenceOf(rawPoints, options), warning: null };
};
