export type Result<T, E = Error> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: E };

export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}
