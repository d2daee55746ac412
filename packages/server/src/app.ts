import { Hono } from "hono";
import { requestContextMiddleware } from "./middleware/request-context";
import { timelineRoutes } from "./routes/timelines";
import type { AppContext, AppEnv } from "./utils/route-helpers";

export function createApp(ctx: AppContext) {
	const app = new Hono<AppEnv>();

	app.use("*", requestContextMiddleware());

	app.use("/api/*", async (c, next) => {
		c.set("appContext", ctx);
		await next();
	});

	app.get("/health", c => c.json({ status: "ok", timestamp: new Date().toISOString() }));

	app.route("/api/v1/timelines", timelineRoutes);

	return app;
}

export type App = ReturnType<typeof createApp>;
export type { AppContext } from "./utils/route-helpers";
