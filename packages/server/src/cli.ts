import { parseArgs } from "node:util";
import { SENTINEL_YEAR, type SentinelPolicy, errorMessage, tryCatchAsync } from "@gpx-timeline/core";
import type { GroupOutcome } from "@gpx-timeline/schema";
import { serve as serveNode } from "@hono/node-server";
import { z } from "zod";
import { type App, createApp } from "./app";
import { type AppConfig, type Env, loadConfig } from "./config";
import { type LogSink, type Logger, configureLogging, consoleSink, createLogger, fileSink } from "./logger";
import { type CommandRunner, createRescan } from "./rescan";
import { type ConsolidationContext, type UpdateContext, combineFiles, runBatch, updateFromTrigger } from "./services/consolidate";
import { pathExists } from "./storage";

export const USAGE = `Usage: gpx-timeline <command> [options]

Commands:
  scan <source_dir> [-o|--output-dir dir] [--dry-run] [--include-existing]
  update -f|--file <file> -p|--path <storage path> [-d|--data-dir dir] [--dry-run]
  combine <file...> -o|--output <file> -s|--session <name> -d|--device <name> [--repair-year <year>]
  serve [--port n]`;

export type CliDeps = {
	env: Env;
	now?: () => Date;
	runner?: CommandRunner;
	serve?: (app: App, port: number) => void;
	print?: (line: string) => void;
};

type CommandContext = {
	config: AppConfig;
	deps: CliDeps;
	print: (line: string) => void;
	log: Logger;
};

const DROP_SENTINELS: SentinelPolicy = { mode: "drop" };

const RepairYearSchema = z.coerce
	.number()
	.int()
	.min(1970)
	.max(9999)
	.refine(year => year !== SENTINEL_YEAR, { message: `cannot repair to ${SENTINEL_YEAR}` });

/** Workflow hooks may hand over paths wrapped in quotes. */
export const stripQuotes = (value: string): string => value.replace(/^['"]+|['"]+$/g, "");

const defaultServe = (app: App, port: number): void => {
	serveNode({ fetch: app.fetch, port });
};

const consolidationContext = (cmd: CommandContext, sentinel: SentinelPolicy = DROP_SENTINELS): ConsolidationContext => ({
	log: cmd.log,
	now: cmd.deps.now ?? (() => new Date()),
	creator: cmd.config.creator,
	sentinel,
});

const updateContext = (cmd: CommandContext, data_dir: string): UpdateContext => ({
	...consolidationContext(cmd),
	data_dir,
	rescan: createRescan({
		command: cmd.config.rescan_command,
		timeout_ms: cmd.config.rescan_timeout_ms,
		runner: cmd.deps.runner,
		log: createLogger("rescan"),
	}),
});

const describeOutcome = (outcome: GroupOutcome): string[] => [
	`${outcome.session}/${outcome.user} -> ${outcome.destination} (${outcome.points_out} points)`,
	...outcome.sources.map(source => `  ${source}`),
];

// === COMMANDS ===

const scanCommand = async (cmd: CommandContext, args: string[]): Promise<number> => {
	const { values, positionals } = parseArgs({
		args,
		options: {
			"output-dir": { type: "string", short: "o" },
			"dry-run": { type: "boolean", default: false },
			"include-existing": { type: "boolean", default: false },
		},
		allowPositionals: true,
	});

	const root = positionals[0];
	if (root === undefined) {
		cmd.print(USAGE);
		return 1;
	}

	const result = await runBatch(consolidationContext(cmd), {
		root,
		output_dir: values["output-dir"],
		include_existing: values["include-existing"] ?? false,
		dry_run: values["dry-run"] ?? false,
	});
	if (!result.ok) {
		cmd.log.error(result.error.message ?? result.error.kind);
		return 1;
	}

	if (values["dry-run"] === true) {
		for (const outcome of result.value.outcomes) for (const line of describeOutcome(outcome)) cmd.print(line);
	}
	return result.value.failed > 0 ? 1 : 0;
};

const updateCommand = async (cmd: CommandContext, args: string[]): Promise<number> => {
	const { values } = parseArgs({
		args,
		options: {
			file: { type: "string", short: "f" },
			path: { type: "string", short: "p" },
			"data-dir": { type: "string", short: "d" },
			"dry-run": { type: "boolean", default: false },
		},
	});

	if (values.file === undefined || values.path === undefined) {
		cmd.print(USAGE);
		return 1;
	}

	const file = stripQuotes(values.file);
	const path = stripQuotes(values.path);
	const data_dir = values["data-dir"] ?? cmd.config.data_dir;

	cmd.log.info(`New file: ${file}`);
	cmd.log.info(`Storage path: ${path}`);
	cmd.log.info(`Data dir: ${data_dir}`);

	if (!(await pathExists(file))) {
		cmd.log.error(`File does not exist: ${file}`);
		return 1;
	}

	const result = await updateFromTrigger(updateContext(cmd, data_dir), { file, path, dry_run: values["dry-run"] ?? false });
	if (!result.ok) {
		cmd.log.error(result.error.message ?? result.error.kind);
		return 1;
	}

	if (result.value.status === "dry_run") for (const line of describeOutcome(result.value)) cmd.print(line);
	return 0;
};

const combineCommand = async (cmd: CommandContext, args: string[]): Promise<number> => {
	const { values, positionals } = parseArgs({
		args,
		options: {
			output: { type: "string", short: "o" },
			session: { type: "string", short: "s" },
			device: { type: "string", short: "d" },
			"repair-year": { type: "string" },
		},
		allowPositionals: true,
	});

	const { output, session, device } = values;
	if (positionals.length < 2 || output === undefined || session === undefined || device === undefined) {
		cmd.print(USAGE);
		return 1;
	}

	let sentinel: SentinelPolicy = DROP_SENTINELS;
	if (values["repair-year"] !== undefined) {
		const year = RepairYearSchema.safeParse(values["repair-year"]);
		if (!year.success) {
			cmd.log.error(`Invalid --repair-year: ${values["repair-year"]}`);
			return 1;
		}
		sentinel = { mode: "repair", year: year.data };
	}

	for (const file of positionals) {
		if (!(await pathExists(file))) {
			cmd.log.error(`File does not exist: ${file}`);
			return 1;
		}
	}

	const result = await combineFiles(consolidationContext(cmd, sentinel), { session, user: device, sources: positionals, destination: output });
	if (!result.ok) {
		cmd.log.error(result.error.message ?? result.error.kind);
		return 1;
	}
	return result.value.status === "written" ? 0 : 1;
};

const serveCommand = (cmd: CommandContext, args: string[]): number => {
	const { values } = parseArgs({
		args,
		options: {
			port: { type: "string" },
		},
	});

	const port = values.port === undefined ? cmd.config.port : Number(values.port);
	if (!Number.isInteger(port) || port < 1 || port > 65535) {
		cmd.log.error(`Invalid --port: ${values.port}`);
		return 1;
	}

	const app = createApp(updateContext(cmd, cmd.config.data_dir));
	(cmd.deps.serve ?? defaultServe)(app, port);
	cmd.log.info(`Listening on port ${port}`);
	return 0;
};

type Command = (cmd: CommandContext, args: string[]) => Promise<number> | number;

const COMMANDS = new Map<string, Command>([
	["scan", scanCommand],
	["update", updateCommand],
	["combine", combineCommand],
	["serve", serveCommand],
]);

// === ENTRY ===

const sinksFor = (config: AppConfig): LogSink[] => (config.log_file ? [consoleSink, fileSink(config.log_file)] : [consoleSink]);

export const runCli = async (argv: string[], deps: CliDeps): Promise<number> => {
	const print = deps.print ?? ((line: string) => console.log(line));
	const [name, ...args] = argv;

	if (name === undefined || name === "help" || name === "--help" || name === "-h") {
		print(USAGE);
		return name === undefined ? 1 : 0;
	}

	const command = COMMANDS.get(name);
	if (!command) {
		print(`Unknown command: ${name}`);
		print(USAGE);
		return 1;
	}

	const config = loadConfig(deps.env);
	if (!config.ok) {
		print(`Invalid configuration: ${JSON.stringify(config.error.errors)}`);
		return 1;
	}

	configureLogging({ level: config.value.log_level, sinks: sinksFor(config.value) });
	const cmd: CommandContext = { config: config.value, deps, print, log: createLogger(name) };

	// parseArgs throws on unknown or malformed options.
	const parsed = await tryCatchAsync(
		async () => command(cmd, args),
		e => errorMessage(e)
	);
	if (!parsed.ok) {
		print(parsed.error);
		print(USAGE);
		return 1;
	}
	return parsed.value;
};
