import { z } from "zod";

const PathSchema = z.string().trim().min(1);

export const UpdateRequestSchema = z.object({
	file: PathSchema,
	path: PathSchema,
	dry_run: z.boolean().default(false),
});

export const ScanRequestSchema = z.object({
	root: PathSchema,
	output_dir: PathSchema.optional(),
	include_existing: z.boolean().default(false),
	dry_run: z.boolean().default(false),
});
