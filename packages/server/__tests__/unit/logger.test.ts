import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { createErrorLogger } from "../../src/error-logging";
import { type LogEntry, configureLogging, createLogger, fileSink, formatLine, resetLogging } from "../../src/logger";
import { runWithRequestContext } from "../../src/request-context";

const capture = () => {
	const entries: LogEntry[] = [];
	return { entries, sink: (entry: LogEntry) => entries.push(entry) };
};

describe("createLogger", () => {
	afterEach(() => {
		resetLogging();
	});

	it("drops entries below the configured level", () => {
		const { entries, sink } = capture();
		const log = createLogger("scan", { level: "warn", sink });

		log.debug("a");
		log.info("b");
		log.warn("c");
		log.error("d");

		expect(entries.map(entry => [entry.level, entry.args[0]])).toEqual([
			["warn", "c"],
			["error", "d"],
		]);
	});

	it("follows the global level and sinks when no options are given", () => {
		const { entries, sink } = capture();
		configureLogging({ level: "debug", sinks: [sink] });

		createLogger("update").debug("visible");

		expect(entries).toHaveLength(1);
		expect(entries[0]?.namespace).toBe("update");
	});

	it("attaches the request id while a request is in flight", () => {
		const { entries, sink } = capture();
		const log = createLogger("http", { sink });

		log.info("outside");
		runWithRequestContext({ requestId: "req_test" }, () => log.info("inside"));

		expect(entries.map(entry => entry.request_id)).toEqual([undefined, "req_test"]);
	});
});

describe("formatLine", () => {
	it("renders timestamp, level, namespace, request id and message", () => {
		const line = formatLine({
			level: "warn",
			namespace: "scan",
			args: ["skipped", 3],
			timestamp: new Date(Date.UTC(2024, 0, 2, 3, 4, 5)),
			request_id: "req_1",
		});

		expect(line).toBe("2024-01-02T03:04:05.000Z WARN [scan] [req_1] skipped 3");
	});
});

describe("fileSink", () => {
	it("appends one line per entry", () => {
		const dir = mkdtempSync(join(tmpdir(), "gpx-timeline-log-"));
		const path = join(dir, "timeline.log");
		const log = createLogger("batch", { sink: fileSink(path) });

		log.info("first");
		log.error("second");

		const lines = readFileSync(path, "utf8").split("\n");
		rmSync(dir, { recursive: true, force: true });

		expect(lines).toHaveLength(3);
		expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\S+Z INFO \[batch\] first$/);
		expect(lines[1]).toMatch(/ ERROR \[batch\] second$/);
		expect(lines[2]).toBe("");
	});
});

describe("createErrorLogger", () => {
	it("logs a skipped source as a warning", () => {
		const { entries, sink } = capture();
		const logError = createErrorLogger(createLogger("errors", { sink }));

		logError({ error: { kind: "source_unreadable", path: "a.gpx", message: "gone" }, context: { timestamp: "2024-07-01T12:00:00.000Z", operation: "extract" } });

		expect(entries.map(entry => [entry.level, entry.args[0]])).toEqual([["warn", "[source_unreadable] gone"]]);
		expect(entries[0]?.args[1]).toEqual({ kind: "source_unreadable", path: "a.gpx", message: "gone", operation: "extract", timestamp: "2024-07-01T12:00:00.000Z" });
	});

	it("logs a failed write as an error", () => {
		const { entries, sink } = capture();
		const logError = createErrorLogger(createLogger("errors", { sink }));

		logError({ error: { kind: "destination_unwritable", path: "out.gpx", message: "read-only" }, context: { timestamp: "2024-07-01T12:00:00.000Z" } });

		expect(entries.map(entry => [entry.level, entry.args[0]])).toEqual([["error", "[destination_unwritable] read-only"]]);
	});
});
