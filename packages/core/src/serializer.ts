import { EXTENSION_FIELDS, type TrackPoint } from "@gpx-timeline/schema";
import { formatUtcSeconds } from "./utils";

export const DEFAULT_CREATOR = "PhoneTrack Timeline Merger";

const GPX_NAMESPACE = "http://www.topografix.com/GPX/1/1";

const NAMESPACES = {
	gpxx: "http://www.garmin.com/xmlschemas/GpxExtensions/v3",
	wptx1: "http://www.garmin.com/xmlschemas/WaypointExtension/v1",
	gpxtpx: "http://www.garmin.com/xmlschemas/TrackPointExtension/v1",
	xsi: "http://www.w3.org/2001/XMLSchema-instance",
} as const;

const SCHEMA_LOCATIONS = [
	[GPX_NAMESPACE, "http://www.topografix.com/GPX/1/1/gpx.xsd"],
	[NAMESPACES.gpxx, "http://www8.garmin.com/xmlschemas/GpxExtensionsv3.xsd"],
	[NAMESPACES.wptx1, "http://www8.garmin.com/xmlschemas/WaypointExtensionv1.xsd"],
	[NAMESPACES.gpxtpx, "http://www8.garmin.com/xmlschemas/TrackPointExtensionv1.xsd"],
] as const;

export type TimelineHeader = {
	session: string;
	user: string;
	created_at: Date;
	creator?: string;
};

const XML_ESCAPES: Record<string, string> = {
	"&": "&amp;",
	"<": "&lt;",
	">": "&gt;",
	'"': "&quot;",
	"'": "&apos;",
};

export const escapeXml = (text: string): string => text.replace(/[&<>"']/g, ch => XML_ESCAPES[ch] ?? ch);

const rootElement = (creator: string): string =>
	[
		`<gpx xmlns="${GPX_NAMESPACE}"`,
		`xmlns:gpxx="${NAMESPACES.gpxx}"`,
		`xmlns:wptx1="${NAMESPACES.wptx1}"`,
		`xmlns:gpxtpx="${NAMESPACES.gpxtpx}"`,
		`creator="${escapeXml(creator)}" version="1.1"`,
		`xmlns:xsi="${NAMESPACES.xsi}"`,
		`xsi:schemaLocation="${SCHEMA_LOCATIONS.flat().join(" ")}">`,
	].join(" ");

const pointLines = (point: TrackPoint): string[] => {
	const lines = [`  <trkpt lat="${escapeXml(point.lat)}" lon="${escapeXml(point.lon)}">`, `   <time>${escapeXml(point.time)}</time>`];

	if (point.elevation !== undefined) lines.push(`   <ele>${escapeXml(point.elevation)}</ele>`);
	if (point.satellite_count !== undefined) lines.push(`   <sat>${escapeXml(point.satellite_count)}</sat>`);

	const { extensions } = point;
	if (extensions) {
		lines.push("   <extensions>");
		for (const field of EXTENSION_FIELDS) {
			const value = extensions[field];
			if (value !== undefined) lines.push(`     <${field}>${escapeXml(value)}</${field}>`);
		}
		lines.push("   </extensions>");
	}

	lines.push("  </trkpt>");
	return lines;
};

/**
 * Renders points as a PhoneTrack-style GPX document. Field order per point is
 * fixed: time, ele, sat, extensions. Lines are joined with "\n" and the
 * document has no trailing newline.
 */
export const serializeTimeline = (points: readonly TrackPoint[], header: TimelineHeader): string => {
	const lines = [
		'<?xml version="1.0" encoding="UTF-8" standalone="no" ?>',
		rootElement(header.creator ?? DEFAULT_CREATOR),
		"<metadata>",
		` <time>${formatUtcSeconds(header.created_at)}</time>`,
		` <name>${escapeXml(header.session)}</name>`,
		"</metadata>",
		"<trk>",
		` <name>${escapeXml(header.user)}</name>`,
		" <trkseg>",
		...points.flatMap(pointLines),
		" </trkseg>",
		"</trk>",
		"</gpx>",
	];

	return lines.join("\n");
};
