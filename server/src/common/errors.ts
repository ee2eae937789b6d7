import { ContractError } from "@parity-duel/sdk";

export function toError(err: unknown): Error {
	if (err instanceof Error) return err;
	return new Error(typeof err === "string" ? err : "Non-error thrown", {
		cause: err,
	});
}

/**
 * One-line description for logs, prefixed with the engine's error code.
 */
export function describeError(err: unknown): string {
	const error = toError(err);
	return error instanceof ContractError && error.code
		? `[${error.code}] ${error.message}`
		: error.message;
}
