import type { ErrorLogEntry, ServiceError } from "@gpx-timeline/schema";
import type { Logger } from "./logger";

// Neither fails the run it belongs to: a skipped source or a rescan after a write.
const WARNING_KINDS: ReadonlySet<ServiceError["kind"]> = new Set(["source_unreadable", "rescan_failed"]);

export const createErrorLogger =
	(log: Logger) =>
	({ error, context }: ErrorLogEntry): void => {
		const write = WARNING_KINDS.has(error.kind) ? log.warn : log.error;
		write(`[${error.kind}] ${error.message || ""}`, {
			...error,
			operation: context.operation,
			timestamp: context.timestamp,
		});
	};
