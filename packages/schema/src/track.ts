import { z } from "zod";

export const EXTENSION_FIELDS = ["speed", "course", "accuracy", "batterylevel", "useragent"] as const;

export const ExtensionFieldSchema = z.enum(EXTENSION_FIELDS);

export const TrackExtensionsSchema = z.object({
	speed: z.string().optional(),
	course: z.string().optional(),
	accuracy: z.string().optional(),
	batterylevel: z.string().optional(),
	useragent: z.string().optional(),
});

export const TrackPointSchema = z.object({
	lat: z.string().min(1),
	lon: z.string().min(1),
	time: z.string().min(1),
	timestamp: z.number().int(),
	elevation: z.string().optional(),
	satellite_count: z.string().optional(),
	extensions: TrackExtensionsSchema.nullable(),
});

export const DropReasonSchema = z.enum(["missing_time", "unparseable_time", "sentinel", "missing_coordinates"]);

export const SentinelPolicySchema = z.discriminatedUnion("mode", [z.object({ mode: z.literal("drop") }), z.object({ mode: z.literal("repair"), year: z.number().int().min(1970).max(9999) })]);

export const SourceKindSchema = z.enum(["daily", "full"]);

export const SourceIdentitySchema = z.object({
	session: z.string().min(1),
	user: z.string().min(1),
	date: z.string().nullable(),
	kind: SourceKindSchema,
});

export const StorageIdentitySchema = z.object({
	owner: z.string().min(1),
	session: z.string().min(1),
	user: z.string().min(1),
	date: z.string(),
	export_dir: z.string(),
});

export const DateRangeSchema = z.object({
	first: z.string(),
	last: z.string(),
});

export const GroupOutcomeSchema = z.object({
	status: z.enum(["written", "empty", "dry_run"]),
	session: z.string(),
	user: z.string(),
	destination: z.string(),
	sources: z.array(z.string()),
	files: z.number().int(),
	points_in: z.number().int(),
	points_out: z.number().int(),
	duplicates: z.number().int(),
	range: DateRangeSchema.nullable(),
});

export const BatchSummarySchema = z.object({
	groups: z.number().int(),
	files: z.number().int(),
	written: z.number().int(),
	empty: z.number().int(),
	failed: z.number().int(),
	total_points: z.number().int(),
	outcomes: z.array(GroupOutcomeSchema),
});
