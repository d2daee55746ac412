import { type GroupKey, type SourceGroup, type SourceIdentity, type StorageIdentity, groupKey } from "@gpx-timeline/schema";
import { foldKey, stripAccents } from "./normalizer";

export const GPX_EXTENSION = ".gpx";
export const TIMELINE_SUFFIX = "_TIMELINE";

const DAILY_PATTERN = /^(.+)_daily_(\d{4}-\d{2}-\d{2})_(.+)\.gpx$/;
const FULL_PATTERN = /^(.+)_([^_]+)\.gpx$/;

const RESERVED_USERS = new Set(["timeline", "merged", "combined"]);

// === HELPERS ===

const basenameOf = (path: string): string => path.split(/[\\/]/).pop() ?? path;

const isReservedUser = (user: string): boolean => RESERVED_USERS.has(user.toLowerCase());

const compareKeys = (a: SourceGroup, b: SourceGroup): number => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0);

// === PUBLIC API ===

export const makeGroupKey = (session: string, user: string): GroupKey => groupKey(JSON.stringify([foldKey(session), foldKey(user)]));

export const timelineFilename = (session: string, user: string): string => `${stripAccents(session)}_${stripAccents(user)}${TIMELINE_SUFFIX}${GPX_EXTENSION}`;

/**
 * Recognises `{session}_daily_{YYYY-MM-DD}_{user}.gpx` and `{session}_{user}.gpx`.
 * Timeline outputs and reserved user names are not sources.
 */
export const parseSourceFilename = (filename: string): SourceIdentity | null => {
	if (filename.includes(`${TIMELINE_SUFFIX}${GPX_EXTENSION}`)) return null;

	const daily = DAILY_PATTERN.exec(filename);
	if (daily) {
		const [, session = "", date = "", user = ""] = daily;
		if (isReservedUser(user)) return null;
		return { session, user, date, kind: "daily" };
	}

	const full = FULL_PATTERN.exec(filename);
	if (full) {
		const [, session = "", user = ""] = full;
		if (isReservedUser(user)) return null;
		return { session, user, date: null, kind: "full" };
	}

	return null;
};

/**
 * Reads `{owner}/files/{export dir}/{daily export filename}` as handed over
 * by the storage trigger. Only daily exports are accepted on this path, and
 * empty, `.` or `..` segments reject it.
 */
export const parseStoragePath = (path: string): StorageIdentity | null => {
	const parts = path.replace(/\\/g, "/").replace(/^\/+/, "").split("/");
	if (parts.length < 3) return null;
	if (parts.some(part => part === "" || part === "." || part === "..")) return null;

	const owner = parts[0] ?? "";
	const filename = parts[parts.length - 1] ?? "";

	const daily = DAILY_PATTERN.exec(filename);
	if (!daily) return null;

	const [, session = "", date = "", user = ""] = daily;
	return { owner, session, user, date, export_dir: parts.slice(1, -1).join("/") };
};

/**
 * Buckets source paths by folded (session, user). Paths are visited in sorted
 * order, so the display names of a group come from its first path in that order.
 */
export const groupSources = (paths: readonly string[]): SourceGroup[] => {
	const groups = [...paths].sort().reduce<Map<GroupKey, SourceGroup>>((acc, path) => {
		const identity = parseSourceFilename(basenameOf(path));
		if (!identity) return acc;

		const key = makeGroupKey(identity.session, identity.user);
		const existing = acc.get(key);
		if (existing) {
			existing.sources.push(path);
		} else {
			acc.set(key, { key, session: identity.session, user: identity.user, sources: [path] });
		}
		return acc;
	}, new Map());

	return Array.from(groups.values()).sort(compareKeys);
};
