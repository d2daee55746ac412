import { mkdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { type Result, errorMessage, ok, tryCatchAsync } from "@gpx-timeline/core";
import { type DestinationUnwritableError, type SourceUnreadableError, errors } from "@gpx-timeline/schema";

export const pathExists = async (path: string): Promise<boolean> => {
	const result = await tryCatchAsync(
		() => stat(path),
		() => null
	);
	return result.ok;
};

export const isDirectory = async (path: string): Promise<boolean> => {
	const result = await tryCatchAsync(
		() => stat(path),
		() => null
	);
	return result.ok && result.value.isDirectory();
};

export const readSource = async (path: string): Promise<Result<string, SourceUnreadableError>> => {
	const result = await tryCatchAsync(
		() => readFile(path, "utf8"),
		e => errorMessage(e)
	);
	if (!result.ok) return errors.sourceUnreadable(path, result.error, { operation: "read_source" });
	return ok(result.value);
};

export const tempPathFor = (destination: string): string => join(dirname(destination), `${basename(destination)}.${process.pid}.tmp`);

/**
 * Writes through a sibling temp file renamed into place, so readers see
 * either the previous document or the new one.
 */
export const writeTimelineAtomic = async (destination: string, content: string): Promise<Result<string, DestinationUnwritableError>> => {
	const temp = tempPathFor(destination);
	const result = await tryCatchAsync(
		async () => {
			await mkdir(dirname(destination), { recursive: true });
			await writeFile(temp, content, "utf8");
			await rename(temp, destination);
			return destination;
		},
		e => errorMessage(e)
	);
	if (result.ok) return ok(result.value);

	await rm(temp, { force: true }).catch(() => undefined);
	return errors.destinationUnwritable(destination, result.error, { operation: "write_timeline" });
};
