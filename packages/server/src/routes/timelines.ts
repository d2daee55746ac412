import { ScanRequestSchema, UpdateRequestSchema, errors } from "@gpx-timeline/schema";
import { Hono } from "hono";
import { runBatch, updateFromTrigger } from "../services/consolidate";
import { type AppEnv, getContext, handleResult } from "../utils/route-helpers";
import { fieldErrors } from "../utils/validation";

export const timelineRoutes = new Hono<AppEnv>();

timelineRoutes.post("/update", async c => {
	const ctx = getContext(c);

	const body = await c.req.json().catch(() => ({}));
	const parseResult = UpdateRequestSchema.safeParse(body);

	if (!parseResult.success) {
		return handleResult(c, errors.validation(fieldErrors(parseResult.error), { operation: "update" }));
	}

	const result = await updateFromTrigger(ctx, parseResult.data);
	return handleResult(c, result);
});

timelineRoutes.post("/scan", async c => {
	const ctx = getContext(c);

	const body = await c.req.json().catch(() => ({}));
	const parseResult = ScanRequestSchema.safeParse(body);

	if (!parseResult.success) {
		return handleResult(c, errors.validation(fieldErrors(parseResult.error), { operation: "scan" }));
	}

	const result = await runBatch(ctx, parseResult.data);
	return handleResult(c, result);
});
