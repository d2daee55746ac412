import { GPX_EXTENSION } from "@gpx-timeline/core";
import fg from "fast-glob";

/** Every `.gpx` file below `root`, as absolute paths in sorted order. */
export const scanSources = async (root: string): Promise<string[]> => {
	const files = await fg(`**/*${GPX_EXTENSION}`, { cwd: root, absolute: true, onlyFiles: true, dot: false });
	return files.sort();
};
