import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { err, extractTrackPoints, unwrap, unwrapErr } from "@gpx-timeline/core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { timelineDirFor, updateFromTrigger } from "../../src/services/consolidate";
import { type TestContext, createTestContext, fixturePoint, writeGpx } from "../helpers";

const STORAGE_PATH = "alice/files/PhoneTrack_export/Pifi Mifi_daily_2024-05-01_Pixel.gpx";

describe("updateFromTrigger", () => {
	let ctx: TestContext;
	let timeline: string;

	beforeEach(() => {
		ctx = createTestContext();
		timeline = join(ctx.root, "data", "alice", "files", "PhoneTrack_export", "TIMELINES", "Pifi Mifi_Pixel_TIMELINE.gpx");
	});

	afterEach(() => {
		ctx.cleanup();
	});

	const timesOf = (path: string): string[] => Array.from(extractTrackPoints(readFileSync(path, "utf8")).points, point => point.time);

	it("creates the timeline from the first export and asks for a rescan", async () => {
		const file = writeGpx(join(ctx.root, "incoming", "day1.gpx"), [fixturePoint("2024-05-01T10:00:00Z"), fixturePoint("2024-05-01T08:00:00Z")]);

		const outcome = unwrap(await updateFromTrigger(ctx.appContext, { file, path: STORAGE_PATH, dry_run: false }));

		expect(outcome.status).toBe("written");
		expect(outcome.destination).toBe(timeline);
		expect(timesOf(timeline)).toEqual(["2024-05-01T08:00:00Z", "2024-05-01T10:00:00Z"]);
		expect(ctx.rescans).toEqual([{ owner: "alice", path: "/alice/files/PhoneTrack_export/TIMELINES" }]);
	});

	it("folds a later export into the existing timeline", async () => {
		const day1 = writeGpx(join(ctx.root, "incoming", "day1.gpx"), [fixturePoint("2024-05-01T10:00:00Z"), fixturePoint("2024-05-01T08:00:00Z")]);
		const day2 = writeGpx(join(ctx.root, "incoming", "day2.gpx"), [fixturePoint("2024-05-01T10:00:00Z"), fixturePoint("2024-05-02T09:00:00Z")]);

		unwrap(await updateFromTrigger(ctx.appContext, { file: day1, path: STORAGE_PATH, dry_run: false }));
		const outcome = unwrap(await updateFromTrigger(ctx.appContext, { file: day2, path: STORAGE_PATH.replace("2024-05-01", "2024-05-02"), dry_run: false }));

		expect(outcome.points_in).toBe(4);
		expect(outcome.duplicates).toBe(1);
		expect(outcome.points_out).toBe(3);
		expect(timesOf(timeline)).toEqual(["2024-05-01T08:00:00Z", "2024-05-01T10:00:00Z", "2024-05-02T09:00:00Z"]);
		expect(ctx.rescans).toHaveLength(2);
	});

	it("rejects a path outside the export layout", async () => {
		const file = writeGpx(join(ctx.root, "incoming", "day1.gpx"), [fixturePoint("2024-05-01T10:00:00Z")]);

		const error = unwrapErr(await updateFromTrigger(ctx.appContext, { file, path: "alice/Trip_Pixel.gpx", dry_run: false }));

		expect(error.kind).toBe("invalid_path");
		expect(ctx.rescans).toEqual([]);
	});

	it("rejects a storage path that climbs out of the data directory", async () => {
		const file = writeGpx(join(ctx.root, "incoming", "day1.gpx"), [fixturePoint("2024-05-01T10:00:00Z")]);

		const error = unwrapErr(await updateFromTrigger(ctx.appContext, { file, path: "../outside/files/Trip_daily_2024-05-01_Phone.gpx", dry_run: false }));

		expect(error.kind).toBe("invalid_path");
		expect(existsSync(join(ctx.root, "outside"))).toBe(false);
		expect(ctx.rescans).toEqual([]);
	});

	it("refuses to write when the new file has no valid points", async () => {
		const file = writeGpx(join(ctx.root, "incoming", "day1.gpx"), [fixturePoint("2000-01-01T00:00:00Z")]);

		const error = unwrapErr(await updateFromTrigger(ctx.appContext, { file, path: STORAGE_PATH, dry_run: false }));

		expect(error).toEqual({ kind: "no_points", path: file, message: `No valid track points in ${file}` });
		expect(existsSync(timeline)).toBe(false);
	});

	it("reports a missing new file as unreadable", async () => {
		const file = join(ctx.root, "incoming", "gone.gpx");

		const error = unwrapErr(await updateFromTrigger(ctx.appContext, { file, path: STORAGE_PATH, dry_run: false }));

		expect(error.kind).toBe("source_unreadable");
	});

	it("keeps the write when the rescan fails", async () => {
		const file = writeGpx(join(ctx.root, "incoming", "day1.gpx"), [fixturePoint("2024-05-01T10:00:00Z")]);
		const appContext = {
			...ctx.appContext,
			rescan: async () => err({ kind: "rescan_failed" as const, command: "occ files:scan", exit_code: 1, message: "boom" }),
		};

		const outcome = unwrap(await updateFromTrigger(appContext, { file, path: STORAGE_PATH, dry_run: false }));

		expect(outcome.status).toBe("written");
		expect(existsSync(timeline)).toBe(true);
		expect(ctx.logs.filter(entry => entry.level === "warn").map(entry => entry.args[0])).toContain("Rescan failed for /alice/files/PhoneTrack_export/TIMELINES: boom");
	});

	it("writes nothing and skips the rescan on a dry run", async () => {
		const file = writeGpx(join(ctx.root, "incoming", "day1.gpx"), [fixturePoint("2024-05-01T10:00:00Z")]);

		const outcome = unwrap(await updateFromTrigger(ctx.appContext, { file, path: STORAGE_PATH, dry_run: true }));

		expect(outcome.status).toBe("dry_run");
		expect(outcome.destination).toBe(timeline);
		expect(existsSync(timeline)).toBe(false);
		expect(ctx.rescans).toEqual([]);
	});

	it("strips accents from the timeline filename", async () => {
		const file = writeGpx(join(ctx.root, "incoming", "day1.gpx"), [fixturePoint("2024-05-01T10:00:00Z")]);

		const outcome = unwrap(await updateFromTrigger(ctx.appContext, { file, path: "/bob/files/Export/Túra_daily_2024-05-01_Ági.gpx", dry_run: false }));

		expect(outcome.destination).toBe(join(ctx.root, "data", "bob", "files", "Export", "TIMELINES", "Tura_Agi_TIMELINE.gpx"));
		expect(outcome.session).toBe("Túra");
		expect(ctx.rescans).toEqual([{ owner: "bob", path: "/bob/files/Export/TIMELINES" }]);
	});
});

describe("timelineDirFor", () => {
	it("places the directory beside the export", () => {
		expect(unwrap(timelineDirFor("/srv/data", { owner: "alice", export_dir: "files/Export" }))).toBe(join("/srv/data", "alice", "files", "Export", "TIMELINES"));
	});

	it("refuses a directory outside the data directory", () => {
		const error = unwrapErr(timelineDirFor("/srv/data", { owner: "..", export_dir: "../etc/files" }));

		expect(error).toEqual({ kind: "invalid_path", path: "/etc/files/TIMELINES", message: "Timeline directory escapes the data directory: /etc/files/TIMELINES" });
	});
});
