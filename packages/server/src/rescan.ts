import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { type Result, errorMessage, ok, tryCatchAsync } from "@gpx-timeline/core";
import { type RescanFailedError, errors } from "@gpx-timeline/schema";
import { z } from "zod";
import type { Logger } from "./logger";

export type CommandOutput = { exit_code: number; stderr: string };

export type CommandRunner = (file: string, args: string[], options: { timeout_ms: number }) => Promise<CommandOutput>;

const execFileAsync = promisify(execFile);

// execFile rejects on a non-zero exit with the code and captured output attached.
const ExitFailureSchema = z.object({
	code: z.number().int(),
	stderr: z.string().default(""),
});

/**
 * Maps a rejection of `execFile` to the command's output when the process ran
 * and exited non-zero. A spawn failure (string `code` such as ENOENT) or a
 * timeout (`code: null`, killed) gives null.
 */
export const exitFailureOf = (rejection: unknown): CommandOutput | null => {
	const failure = ExitFailureSchema.safeParse(rejection);
	return failure.success ? { exit_code: failure.data.code, stderr: failure.data.stderr } : null;
};

export const execFileRunner: CommandRunner = async (file, args, options) => {
	try {
		const { stderr } = await execFileAsync(file, args, { timeout: options.timeout_ms, encoding: "utf8" });
		return { exit_code: 0, stderr };
	} catch (e) {
		const failure = exitFailureOf(e);
		if (failure) return failure;
		throw e;
	}
};

export type RescanOptions = {
	/** Executable and leading arguments. Empty disables the hook. */
	command: readonly string[];
	timeout_ms: number;
	runner?: CommandRunner;
	log: Logger;
};

export type Rescan = (owner: string, path: string) => Promise<Result<void, RescanFailedError>>;

/** Asks the file server to re-index `path` for `owner` so a new timeline shows up in its UI. */
export const createRescan = (options: RescanOptions): Rescan => {
	const { command, timeout_ms, runner = execFileRunner, log } = options;
	const [file, ...leading] = command;

	return async (owner, path) => {
		if (file === undefined) {
			log.debug("Rescan disabled, skipping", { owner, path });
			return ok(undefined);
		}

		const args = [...leading, "files:scan", owner, "--path", path];
		const printable = [file, ...args].join(" ");
		const result = await tryCatchAsync(
			() => runner(file, args, { timeout_ms }),
			e => errorMessage(e)
		);

		if (!result.ok) return errors.rescanFailed(printable, undefined, result.error, { operation: "rescan" });
		if (result.value.exit_code !== 0) {
			return errors.rescanFailed(printable, result.value.exit_code, result.value.stderr.trim() || `exited with code ${result.value.exit_code}`, { operation: "rescan" });
		}

		log.info(`Rescan completed for ${path}`);
		return ok(undefined);
	};
};
