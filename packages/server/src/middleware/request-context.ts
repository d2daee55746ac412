import type { MiddlewareHandler } from "hono";
import { type RequestContext, generateRequestId, runWithRequestContext } from "../request-context";

export const requestContextMiddleware = (): MiddlewareHandler => {
	return async (c, next) => {
		const context: RequestContext = {
			requestId: c.req.header("x-request-id") || generateRequestId(),
			path: c.req.path,
			method: c.req.method,
		};

		c.header("x-request-id", context.requestId);

		return runWithRequestContext(context, () => next());
	};
};

export { getRequestContext } from "../request-context";
