import { DEFAULT_CREATOR, type Result, ok } from "@gpx-timeline/core";
import { type ValidationError, errors } from "@gpx-timeline/schema";
import { z } from "zod";
import type { LogLevel } from "./logger";
import { fieldErrors } from "./utils/validation";

export const DEFAULT_DATA_DIR = "/mnt/ncdata";
export const DEFAULT_RESCAN_COMMAND = "php /var/www/html/occ";
export const DEFAULT_PORT = 8787;

export type AppConfig = {
	log_level: LogLevel;
	log_file: string | null;
	data_dir: string;
	creator: string;
	/** Executable followed by its leading arguments; empty when rescans are off. */
	rescan_command: string[];
	rescan_timeout_ms: number;
	port: number;
};

export type Env = Record<string, string | undefined>;

const EnvSchema = z.object({
	LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
	LOG_FILE: z.string().optional(),
	TIMELINE_DATA_DIR: z.string().min(1).default(DEFAULT_DATA_DIR),
	TIMELINE_CREATOR: z.string().min(1).default(DEFAULT_CREATOR),
	RESCAN_COMMAND: z.string().default(DEFAULT_RESCAN_COMMAND),
	RESCAN_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
	PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
});

export const splitCommand = (command: string): string[] => command.split(/\s+/).filter(part => part.length > 0);

export const loadConfig = (env: Env): Result<AppConfig, ValidationError> => {
	const parsed = EnvSchema.safeParse(env);
	if (!parsed.success) return errors.validation(fieldErrors(parsed.error), { operation: "load_config" });

	const vars = parsed.data;
	return ok({
		log_level: vars.LOG_LEVEL,
		log_file: vars.LOG_FILE || null,
		data_dir: vars.TIMELINE_DATA_DIR,
		creator: vars.TIMELINE_CREATOR,
		rescan_command: splitCommand(vars.RESCAN_COMMAND),
		rescan_timeout_ms: vars.RESCAN_TIMEOUT_MS,
		port: vars.PORT,
	});
};
