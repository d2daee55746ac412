/**
 * Simple structured logger with log levels.
 * Only info and above are logged unless LOG_LEVEL says otherwise.
 * Lines written while a request is in flight carry its request id.
 */

import { appendFileSync } from "node:fs";
import { format } from "node:util";
import { getRequestContext } from "./request-context";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

export type LogEntry = {
	level: LogLevel;
	namespace: string;
	args: unknown[];
	timestamp: Date;
	request_id?: string;
};

export type LogSink = (entry: LogEntry) => void;

const prefixOf = (entry: LogEntry): string => (entry.request_id ? `[${entry.namespace}] [${entry.request_id}]` : `[${entry.namespace}]`);

export const consoleSink: LogSink = entry => {
	const prefix = prefixOf(entry);
	if (entry.level === "error") console.error(prefix, ...entry.args);
	else if (entry.level === "warn") console.warn(prefix, ...entry.args);
	else console.log(prefix, ...entry.args);
};

export const formatLine = (entry: LogEntry): string => `${entry.timestamp.toISOString()} ${entry.level.toUpperCase()} ${prefixOf(entry)} ${format(...entry.args)}`;

export const fileSink =
	(path: string): LogSink =>
	entry => {
		appendFileSync(path, `${formatLine(entry)}\n`);
	};

type LoggingSettings = {
	level: LogLevel;
	sinks: LogSink[];
};

const defaultSettings = (): LoggingSettings => ({ level: "info", sinks: [consoleSink] });

let settings: LoggingSettings = defaultSettings();

export const configureLogging = (overrides: Partial<LoggingSettings>): void => {
	settings = { ...settings, ...overrides };
};

export const resetLogging = (): void => {
	settings = defaultSettings();
};

export type LoggerOptions = {
	level?: LogLevel;
	sink?: LogSink;
};

export const createLogger = (namespace: string, options: LoggerOptions = {}) => {
	const shouldLog = (level: LogLevel): boolean => {
		return LOG_LEVELS[level] >= LOG_LEVELS[options.level ?? settings.level];
	};

	const emit = (level: LogLevel, args: unknown[]) => {
		if (!shouldLog(level)) return;
		const request_id = getRequestContext()?.requestId;
		const entry: LogEntry = { level, namespace, args, timestamp: new Date(), ...(request_id && { request_id }) };
		const sinks = options.sink ? [options.sink] : settings.sinks;
		for (const sink of sinks) sink(entry);
	};

	return {
		debug: (...args: unknown[]) => emit("debug", args),
		info: (...args: unknown[]) => emit("info", args),
		warn: (...args: unknown[]) => emit("warn", args),
		error: (...args: unknown[]) => emit("error", args),
	};
};

export type Logger = ReturnType<typeof createLogger>;
