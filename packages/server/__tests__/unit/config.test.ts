import { unwrap, unwrapErr } from "@gpx-timeline/core";
import { resetErrorLogging, configureErrorLogging } from "@gpx-timeline/schema";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig, splitCommand } from "../../src/config";

describe("loadConfig", () => {
	beforeEach(() => {
		configureErrorLogging({ logger: () => undefined });
	});

	afterEach(() => {
		resetErrorLogging();
	});

	it("applies defaults to an empty environment", () => {
		expect(unwrap(loadConfig({}))).toEqual({
			log_level: "info",
			log_file: null,
			data_dir: "/mnt/ncdata",
			creator: "PhoneTrack Timeline Merger",
			rescan_command: ["php", "/var/www/html/occ"],
			rescan_timeout_ms: 60_000,
			port: 8787,
		});
	});

	it("reads every variable", () => {
		const config = unwrap(
			loadConfig({
				LOG_LEVEL: "debug",
				LOG_FILE: "/var/log/timeline.log",
				TIMELINE_DATA_DIR: "/srv/data",
				TIMELINE_CREATOR: "Timeline Updater",
				RESCAN_COMMAND: "sudo -u www-data php occ",
				RESCAN_TIMEOUT_MS: "5000",
				PORT: "9000",
			})
		);

		expect(config).toEqual({
			log_level: "debug",
			log_file: "/var/log/timeline.log",
			data_dir: "/srv/data",
			creator: "Timeline Updater",
			rescan_command: ["sudo", "-u", "www-data", "php", "occ"],
			rescan_timeout_ms: 5000,
			port: 9000,
		});
	});

	it("disables the rescan with an empty command", () => {
		expect(unwrap(loadConfig({ RESCAN_COMMAND: "" })).rescan_command).toEqual([]);
	});

	it("treats an empty log file as unset", () => {
		expect(unwrap(loadConfig({ LOG_FILE: "" })).log_file).toBeNull();
	});

	it("rejects an unknown log level", () => {
		const error = unwrapErr(loadConfig({ LOG_LEVEL: "loud" }));

		expect(error.kind).toBe("validation");
		expect(Object.keys(error.errors)).toEqual(["LOG_LEVEL"]);
	});

	it("rejects an out of range port and a non-numeric timeout", () => {
		const error = unwrapErr(loadConfig({ PORT: "70000", RESCAN_TIMEOUT_MS: "soon" }));

		expect(Object.keys(error.errors).sort()).toEqual(["PORT", "RESCAN_TIMEOUT_MS"]);
	});
});

describe("splitCommand", () => {
	it("splits on runs of whitespace", () => {
		expect(splitCommand("  php   /var/www/html/occ ")).toEqual(["php", "/var/www/html/occ"]);
	});
});
