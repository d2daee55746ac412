import type { z } from "zod";
import type { GroupKey } from "./branded";
import type { ScanRequestSchema, UpdateRequestSchema } from "./requests";
import type {
	BatchSummarySchema,
	DateRangeSchema,
	DropReasonSchema,
	ExtensionFieldSchema,
	GroupOutcomeSchema,
	SentinelPolicySchema,
	SourceIdentitySchema,
	SourceKindSchema,
	StorageIdentitySchema,
	TrackExtensionsSchema,
	TrackPointSchema,
} from "./track";

export type ExtensionField = z.infer<typeof ExtensionFieldSchema>;
export type TrackExtensions = Readonly<z.infer<typeof TrackExtensionsSchema>>;
export type TrackPoint = Readonly<z.infer<typeof TrackPointSchema>>;
export type DropReason = z.infer<typeof DropReasonSchema>;
export type SentinelPolicy = z.infer<typeof SentinelPolicySchema>;

/** Lazy, restartable: each iteration re-reads the parsed document. */
export type TrackPointSequence = Iterable<TrackPoint>;

export type SourceKind = z.infer<typeof SourceKindSchema>;
export type SourceIdentity = z.infer<typeof SourceIdentitySchema>;
export type StorageIdentity = z.infer<typeof StorageIdentitySchema>;

export type SourceGroup = {
	key: GroupKey;
	session: string;
	user: string;
	sources: string[];
};

export type DateRange = z.infer<typeof DateRangeSchema>;
export type GroupOutcome = z.infer<typeof GroupOutcomeSchema>;
export type BatchSummary = z.infer<typeof BatchSummarySchema>;

export type UpdateRequest = z.infer<typeof UpdateRequestSchema>;
export type ScanRequest = z.infer<typeof ScanRequestSchema>;
