import type { ErrorLogEntry } from "@gpx-timeline/schema";
import type { LogEntry } from "../../src/logger";
import type { UpdateContext } from "../../src/services/consolidate";

export type RescanCall = { owner: string; path: string };

export type TestContext = {
	/** Per-test temporary directory, removed by cleanup. */
	root: string;
	appContext: UpdateContext;
	logs: LogEntry[];
	errors: ErrorLogEntry[];
	rescans: RescanCall[];
	cleanup(): void;
};
