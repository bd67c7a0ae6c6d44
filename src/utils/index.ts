export function normalizePath(path: string): string {
	return path.replace(/\\/g, "/");
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Outcome of an operation whose failures are expected and handled by the caller.
 * `kind` tells the caller what went wrong; `detail` is for the logs.
 */
export type Result<T, K extends string> =
	| { ok: true; value: T }
	| { ok: false; kind: K; detail: string };

export function ok<T>(value: T): { ok: true; value: T } {
	return { ok: true, value };
}

export function fail<K extends string>(kind: K, detail: string): { ok: false; kind: K; detail: string } {
	return { ok: false, kind, detail };
}
