import type { Result } from "@gpx-timeline/core";
import type { ServiceError } from "@gpx-timeline/schema";
import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { UpdateContext } from "../services/consolidate";

export type AppContext = UpdateContext;

export type Variables = {
	appContext: AppContext;
};

export type AppEnv = { Variables: Variables };

export const getContext = <C extends { get: (k: "appContext") => AppContext }>(c: C): AppContext => {
	const ctx = c.get("appContext");
	if (!ctx) throw new Error("AppContext not set");
	return ctx;
};

type ErrorMapping = {
	status: 400 | 404 | 422 | 500;
	code: string;
	defaultMessage: string;
};

const ERROR_MAPPINGS: Record<ServiceError["kind"], ErrorMapping> = {
	invalid_path: { status: 400, code: "INVALID_PATH", defaultMessage: "Path does not match the export layout" },
	validation: { status: 400, code: "VALIDATION_ERROR", defaultMessage: "Validation failed" },
	no_points: { status: 422, code: "NO_POINTS", defaultMessage: "No valid track points" },
	source_unreadable: { status: 404, code: "SOURCE_UNREADABLE", defaultMessage: "Source could not be read" },
	destination_unwritable: { status: 500, code: "DESTINATION_UNWRITABLE", defaultMessage: "Timeline could not be written" },
	rescan_failed: { status: 500, code: "RESCAN_FAILED", defaultMessage: "Rescan failed" },
};

const buildMessage = (error: ServiceError): string => {
	if (error.message) return error.message;
	if ("path" in error) return `${ERROR_MAPPINGS[error.kind].defaultMessage}: ${error.path}`;
	return ERROR_MAPPINGS[error.kind].defaultMessage;
};

type ErrorResponseBody = { error: string; code: string; message: string; details?: unknown };
type ErrorResponse = {
	status: ErrorMapping["status"];
	body: ErrorResponseBody;
};

const ERROR_NAMES: Record<ErrorMapping["status"], string> = {
	400: "Bad request",
	404: "Not found",
	422: "Unprocessable entity",
	500: "Internal server error",
};

export const mapServiceErrorToResponse = (error: ServiceError): ErrorResponse => {
	const mapping = ERROR_MAPPINGS[error.kind];
	const body: ErrorResponseBody = {
		error: ERROR_NAMES[mapping.status],
		code: mapping.code,
		message: buildMessage(error),
	};

	if (error.kind === "validation") {
		body.details = error.errors;
	}

	return { status: mapping.status, body };
};

export const handleResult = <T>(c: Context, result: Result<T, ServiceError>, successStatus: ContentfulStatusCode = 200): Response => {
	if (!result.ok) {
		const { status, body } = mapServiceErrorToResponse(result.error);
		return c.json(body, status);
	}
	return c.json(result.value, successStatus);
};
