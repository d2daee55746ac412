import { isAbsolute, join, relative, resolve, sep } from "node:path";
import {
	type DropReason,
	type Result,
	type SentinelPolicy,
	type StorageIdentity,
	type TrackPoint,
	collect,
	consolidate,
	dateRange,
	extractTrackPoints,
	groupSources,
	ok,
	parseStoragePath,
	serializeTimeline,
	timelineFilename,
} from "@gpx-timeline/core";
import { type BatchSummary, type GroupError, type GroupOutcome, type InvalidPathError, type SourceUnreadableError, type UpdateError, type UpdateRequest, errors } from "@gpx-timeline/schema";
import type { Logger } from "../logger";
import type { Rescan } from "../rescan";
import { scanSources } from "../scanner";
import { isDirectory, pathExists, readSource, writeTimelineAtomic } from "../storage";

export const TIMELINES_DIR = "TIMELINES";
export const DEFAULT_OUTPUT_DIR = "Timelines";

export type ConsolidationContext = {
	log: Logger;
	now: () => Date;
	creator: string;
	sentinel: SentinelPolicy;
};

export type UpdateContext = ConsolidationContext & {
	data_dir: string;
	rescan: Rescan;
};

export type GroupPlan = {
	session: string;
	user: string;
	sources: readonly string[];
	destination: string;
	include_existing: boolean;
	dry_run?: boolean;
};

export type BatchOptions = {
	root: string;
	output_dir?: string;
	include_existing?: boolean;
	dry_run?: boolean;
};

// === SOURCE LOADING ===

const describeDrops = (drops: Map<DropReason, number>): string =>
	Array.from(drops.entries())
		.map(([reason, count]) => `${reason}: ${count}`)
		.join(", ");

export const loadPoints = async (ctx: ConsolidationContext, path: string): Promise<Result<TrackPoint[], SourceUnreadableError>> => {
	const text = await readSource(path);
	if (!text.ok) return text;

	const drops = new Map<DropReason, number>();
	const { points, warning } = extractTrackPoints(text.value, {
		sentinel: ctx.sentinel,
		onDrop: reason => drops.set(reason, (drops.get(reason) ?? 0) + 1),
	});
	if (warning) return errors.sourceUnreadable(path, warning.message, { operation: "extract" });

	const list = [...points];
	if (drops.size > 0) ctx.log.debug(`Dropped points from ${path} (${describeDrops(drops)})`);

	const range = dateRange(list);
	ctx.log.info(range ? `${path}: ${list.length} points, ${range.first} to ${range.last}` : `${path}: no valid points`);
	return ok(list);
};

const loadSources = async (ctx: ConsolidationContext, sources: readonly string[]): Promise<TrackPoint[][]> => {
	const loaded: TrackPoint[][] = [];
	for (const path of sources) {
		const points = await loadPoints(ctx, path);
		if (points.ok) loaded.push(points.value);
		else ctx.log.warn(`Skipping ${path}: ${points.error.message ?? points.error.kind}`);
	}
	return loaded;
};

const loadExisting = async (ctx: ConsolidationContext, destination: string): Promise<TrackPoint[]> => {
	if (!(await pathExists(destination))) {
		ctx.log.info(`No existing timeline at ${destination}, creating new one`);
		return [];
	}

	const existing = await loadPoints(ctx, destination);
	if (existing.ok) return existing.value;

	ctx.log.warn(`Ignoring unreadable timeline ${destination}: ${existing.error.message ?? existing.error.kind}`);
	return [];
};

// === CONSOLIDATION ===

const reduceGroup = async (ctx: ConsolidationContext, plan: GroupPlan, loaded: TrackPoint[][]): Promise<Result<GroupOutcome, GroupError>> => {
	const existing = plan.include_existing ? await loadExisting(ctx, plan.destination) : [];
	const { points, stats } = consolidate(existing, loaded);
	const range = dateRange(points);

	const outcome = (status: GroupOutcome["status"]): GroupOutcome => ({
		status,
		session: plan.session,
		user: plan.user,
		destination: plan.destination,
		sources: [...plan.sources],
		files: loaded.length,
		points_in: stats.input,
		points_out: stats.unique,
		duplicates: stats.duplicates,
		range,
	});

	ctx.log.info(`${plan.session}/${plan.user}: ${loaded.length} files, ${stats.input} points, ${stats.unique} after dedup${range ? `, ${range.first} to ${range.last}` : ""}`);

	if (points.length === 0) {
		ctx.log.warn(`No valid points for ${plan.session}/${plan.user}, nothing written`);
		return ok(outcome("empty"));
	}

	if (plan.dry_run) {
		ctx.log.info(`Dry run: would write ${points.length} points to ${plan.destination}`);
		return ok(outcome("dry_run"));
	}

	const xml = serializeTimeline(points, { session: plan.session, user: plan.user, created_at: ctx.now(), creator: ctx.creator });
	const written = await writeTimelineAtomic(plan.destination, xml);
	if (!written.ok) return written;

	ctx.log.info(`Wrote ${points.length} points to ${plan.destination}`);
	return ok(outcome("written"));
};

/**
 * Reads every source of one Group, folds them (and the current timeline when
 * asked) into one sequence and writes it. Unreadable sources are skipped.
 */
export const consolidateGroup = async (ctx: ConsolidationContext, plan: GroupPlan): Promise<Result<GroupOutcome, GroupError>> => {
	const loaded = await loadSources(ctx, plan.sources);
	return reduceGroup(ctx, plan, loaded);
};

const summarize = (outcomes: GroupOutcome[], failed: number): BatchSummary => ({
	groups: outcomes.length + failed,
	files: outcomes.reduce((sum, o) => sum + o.files, 0),
	written: outcomes.filter(o => o.status === "written").length,
	empty: outcomes.filter(o => o.status === "empty").length,
	failed,
	total_points: outcomes.reduce((sum, o) => sum + o.points_out, 0),
	outcomes,
});

/** Batch mode: one timeline per (session, user) found below `root`. Groups run one after another. */
export const runBatch = async (ctx: ConsolidationContext, options: BatchOptions): Promise<Result<BatchSummary, SourceUnreadableError>> => {
	if (!(await isDirectory(options.root))) return errors.sourceUnreadable(options.root, "Source directory does not exist", { operation: "scan" });

	const output_dir = options.output_dir ?? join(options.root, DEFAULT_OUTPUT_DIR);
	const groups = groupSources(await scanSources(options.root));
	if (groups.length === 0) ctx.log.info(`No source files found in ${options.root}`);

	const outcomes: GroupOutcome[] = [];
	let failed = 0;
	for (const group of groups) {
		const plan: GroupPlan = {
			session: group.session,
			user: group.user,
			sources: group.sources,
			destination: join(output_dir, timelineFilename(group.session, group.user)),
			include_existing: options.include_existing ?? false,
			dry_run: options.dry_run ?? false,
		};
		const result = await consolidateGroup(ctx, plan);
		if (result.ok) {
			outcomes.push(result.value);
		} else {
			failed++;
			ctx.log.error(`Group ${group.session}/${group.user} failed: ${result.error.message ?? result.error.kind}`);
		}
	}

	const summary = summarize(outcomes, failed);
	ctx.log.info(`Batch done: ${summary.groups} groups, ${summary.files} files, ${summary.written} written, ${summary.empty} empty, ${summary.failed} failed, ${summary.total_points} points`);
	return ok(summary);
};

/** The TIMELINES directory beside an export, refused when it would land outside `data_dir`. */
export const timelineDirFor = (data_dir: string, identity: Pick<StorageIdentity, "owner" | "export_dir">): Result<string, InvalidPathError> => {
	const root = resolve(data_dir);
	const dir = resolve(root, identity.owner, identity.export_dir, TIMELINES_DIR);
	const inside = relative(root, dir);
	if (inside === ".." || inside.startsWith(`..${sep}`) || isAbsolute(inside)) {
		return errors.invalidPath(dir, `Timeline directory escapes the data directory: ${dir}`, { operation: "update" });
	}
	return ok(join(data_dir, identity.owner, identity.export_dir, TIMELINES_DIR));
};

/**
 * Triggered update: folds one freshly exported daily file into the owner's
 * running timeline, then asks the file server to rescan. A failed rescan
 * never undoes the write.
 */
export const updateFromTrigger = async (ctx: UpdateContext, request: UpdateRequest): Promise<Result<GroupOutcome, UpdateError>> => {
	const identity = parseStoragePath(request.path);
	if (!identity) return errors.invalidPath(request.path, `Could not parse storage path: ${request.path}`, { operation: "update" });

	ctx.log.info(`Processing: owner=${identity.owner}, session=${identity.session}, user=${identity.user}, date=${identity.date}`);

	const timeline_dir = timelineDirFor(ctx.data_dir, identity);
	if (!timeline_dir.ok) return timeline_dir;
	const destination = join(timeline_dir.value, timelineFilename(identity.session, identity.user));

	const incoming = await loadPoints(ctx, request.file);
	if (!incoming.ok) return incoming;
	if (incoming.value.length === 0) return errors.noPoints(request.file, { operation: "update" });

	const plan: GroupPlan = {
		session: identity.session,
		user: identity.user,
		sources: [request.file],
		destination,
		include_existing: true,
		dry_run: request.dry_run,
	};
	const result = await reduceGroup(ctx, plan, [incoming.value]);
	if (!result.ok || result.value.status !== "written") return result;

	const rescan_path = `/${[identity.owner, identity.export_dir, TIMELINES_DIR].filter(part => part.length > 0).join("/")}`;
	const rescanned = await ctx.rescan(identity.owner, rescan_path);
	if (!rescanned.ok) ctx.log.warn(`Rescan failed for ${rescan_path}: ${rescanned.error.message ?? rescanned.error.kind}`);

	return result;
};

const loadAll = async (ctx: ConsolidationContext, sources: readonly string[]): Promise<Result<TrackPoint[][], SourceUnreadableError>> => {
	const results: Result<TrackPoint[], SourceUnreadableError>[] = [];
	for (const path of sources) results.push(await loadPoints(ctx, path));
	return collect(results);
};

/**
 * Merges explicitly named files into one output, with no grouping and no
 * existing timeline. Any unreadable input fails the whole merge.
 */
export const combineFiles = async (ctx: ConsolidationContext, plan: Omit<GroupPlan, "include_existing">): Promise<Result<GroupOutcome, GroupError>> => {
	const loaded = await loadAll(ctx, plan.sources);
	if (!loaded.ok) return loaded;
	return reduceGroup(ctx, { ...plan, include_existing: false }, loaded.value);
};
