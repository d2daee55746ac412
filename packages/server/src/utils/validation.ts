import type { ZodError } from "zod";

export const fieldErrors = (error: ZodError): Record<string, string[]> => {
	const { formErrors, fieldErrors: fields } = error.flatten();
	const entries = Object.entries(fields).map(([field, messages]): [string, string[]] => [field, messages ?? []]);
	return formErrors.length > 0 ? { _root: formErrors, ...Object.fromEntries(entries) } : Object.fromEntries(entries);
};
