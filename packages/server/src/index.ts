// Main exports for @gpx-timeline/server package

import { configureErrorLogging } from "@gpx-timeline/schema";
import { createErrorLogger } from "./error-logging";
import { createLogger } from "./logger";
import { getRequestContext } from "./request-context";

configureErrorLogging({
	logger: createErrorLogger(createLogger("errors")),
	contextProvider: () => {
		const request = getRequestContext();
		return request ? { requestId: request.requestId } : {};
	},
});

export { createApp, type App, type AppContext } from "./app";
export { USAGE, runCli, stripQuotes, type CliDeps } from "./cli";
export { createErrorLogger } from "./error-logging";
export { DEFAULT_DATA_DIR, DEFAULT_PORT, DEFAULT_RESCAN_COMMAND, loadConfig, splitCommand, type AppConfig, type Env } from "./config";
export { LOG_LEVELS, configureLogging, consoleSink, createLogger, fileSink, formatLine, resetLogging, type LogEntry, type LogLevel, type LogSink, type Logger, type LoggerOptions } from "./logger";
export { requestContextMiddleware } from "./middleware/request-context";
export { generateRequestId, getRequestContext, runWithRequestContext, type RequestContext } from "./request-context";
export { createRescan, execFileRunner, exitFailureOf, type CommandOutput, type CommandRunner, type Rescan, type RescanOptions } from "./rescan";
export { timelineRoutes } from "./routes/timelines";
export { scanSources } from "./scanner";
export {
	DEFAULT_OUTPUT_DIR,
	TIMELINES_DIR,
	combineFiles,
	consolidateGroup,
	loadPoints,
	runBatch,
	timelineDirFor,
	updateFromTrigger,
	type BatchOptions,
	type ConsolidationContext,
	type GroupPlan,
	type UpdateContext,
} from "./services/consolidate";
export { isDirectory, pathExists, readSource, tempPathFor, writeTimelineAtomic } from "./storage";
export { handleResult, mapServiceErrorToResponse } from "./utils/route-helpers";
