import { err, type Result } from "./result";

export type BaseError = { kind: string; message?: string };
export type SourceUnreadableError = BaseError & { kind: "source_unreadable"; path: string };
export type DestinationUnwritableError = BaseError & { kind: "destination_unwritable"; path: string };
export type InvalidPathError = BaseError & { kind: "invalid_path"; path: string };
export type NoPointsError = BaseError & { kind: "no_points"; path: string };
export type ValidationError = BaseError & { kind: "validation"; errors: Record<string, string[]> };
export type RescanFailedError = BaseError & { kind: "rescan_failed"; command: string; exit_code?: number };

export type ServiceError = SourceUnreadableError | DestinationUnwritableError | InvalidPathError | NoPointsError | ValidationError | RescanFailedError;
export type GroupError = SourceUnreadableError | DestinationUnwritableError;
export type UpdateError = InvalidPathError | NoPointsError | SourceUnreadableError | DestinationUnwritableError;

export type ErrorContext = { timestamp: string; requestId?: string; operation?: string; [key: string]: unknown };
export type ErrorLogEntry = { error: ServiceError; context: ErrorContext };
type ErrorLogFn = (entry: ErrorLogEntry) => void;

const defaultLogger: ErrorLogFn = ({ error, context }) => {
	console.error(`[${context.timestamp}] [${error.kind}]`, error.message || error.kind, { ...error, ...context });
};

let errorLogger: ErrorLogFn = defaultLogger;
let contextProvider: (() => Partial<ErrorContext>) | null = null;

export const configureErrorLogging = (config: { logger?: ErrorLogFn; contextProvider?: () => Partial<ErrorContext> }) => {
	if (config.logger) errorLogger = config.logger;
	if (config.contextProvider) contextProvider = config.contextProvider;
};

export const resetErrorLogging = () => {
	errorLogger = defaultLogger;
	contextProvider = null;
};

const logAndReturn = <E extends ServiceError>(error: E, ctx?: Record<string, unknown>): Result<never, E> => {
	const context: ErrorContext = { timestamp: new Date().toISOString(), ...contextProvider?.(), ...ctx };
	errorLogger({ error, context });
	return err(error);
};

const hasKind = (e: unknown, kind: string): boolean => typeof e === "object" && e !== null && "kind" in e && e.kind === kind;

export const isSourceUnreadableError = (e: unknown): e is SourceUnreadableError => hasKind(e, "source_unreadable");
export const isDestinationUnwritableError = (e: unknown): e is DestinationUnwritableError => hasKind(e, "destination_unwritable");
export const isInvalidPathError = (e: unknown): e is InvalidPathError => hasKind(e, "invalid_path");
export const isNoPointsError = (e: unknown): e is NoPointsError => hasKind(e, "no_points");
export const isValidationError = (e: unknown): e is ValidationError => hasKind(e, "validation");
export const isRescanFailedError = (e: unknown): e is RescanFailedError => hasKind(e, "rescan_failed");

export const sourceUnreadable = (path: string, message?: string, ctx?: Record<string, unknown>): Result<never, SourceUnreadableError> => logAndReturn({ kind: "source_unreadable", path, ...(message && { message }) }, ctx);
export const destinationUnwritable = (path: string, message?: string, ctx?: Record<string, unknown>): Result<never, DestinationUnwritableError> =>
	logAndReturn({ kind: "destination_unwritable", path, ...(message && { message }) }, ctx);
export const invalidPath = (path: string, message?: string, ctx?: Record<string, unknown>): Result<never, InvalidPathError> => logAndReturn({ kind: "invalid_path", path, ...(message && { message }) }, ctx);
export const noPoints = (path: string, ctx?: Record<string, unknown>): Result<never, NoPointsError> => logAndReturn({ kind: "no_points", path, message: `No valid track points in ${path}` }, ctx);
export const validation = (errors: Record<string, string[]>, ctx?: Record<string, unknown>): Result<never, ValidationError> => logAndReturn({ kind: "validation", errors }, ctx);
export const rescanFailed = (command: string, exit_code?: number, message?: string, ctx?: Record<string, unknown>): Result<never, RescanFailedError> =>
	logAndReturn({ kind: "rescan_failed", command, ...(exit_code !== undefined && { exit_code }), ...(message && { message }) }, ctx);

export const errors = {
	sourceUnreadable,
	destinationUnwritable,
	invalidPath,
	noPoints,
	validation,
	rescanFailed,
	is: {
		sourceUnreadable: isSourceUnreadableError,
		destinationUnwritable: isDestinationUnwritableError,
		invalidPath: isInvalidPathError,
		noPoints: isNoPointsError,
		validation: isValidationError,
		rescanFailed: isRescanFailedError,
	},
} as const;
