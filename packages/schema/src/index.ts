export * from "./branded";
export * from "./errors";
export * from "./result";

export {
	BatchSummarySchema,
	DateRangeSchema,
	DropReasonSchema,
	EXTENSION_FIELDS,
	ExtensionFieldSchema,
	GroupOutcomeSchema,
	SentinelPolicySchema,
	SourceIdentitySchema,
	SourceKindSchema,
	StorageIdentitySchema,
	TrackExtensionsSchema,
	TrackPointSchema,
} from "./track";

export { ScanRequestSchema, UpdateRequestSchema } from "./requests";

export type {
	BatchSummary,
	DateRange,
	DropReason,
	ExtensionField,
	GroupOutcome,
	ScanRequest,
	SentinelPolicy,
	SourceGroup,
	SourceIdentity,
	SourceKind,
	StorageIdentity,
	TrackExtensions,
	TrackPoint,
	TrackPointSequence,
	UpdateRequest,
} from "./types";
