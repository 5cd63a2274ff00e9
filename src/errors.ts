export function isNodeError(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err;
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

export class ManifestNotFoundError extends Error {
	readonly manifestPath: string;

	constructor(manifestPath: string) {
		super(`Cannot find install manifest: "${manifestPath}"`);
		this.name = "ManifestNotFoundError";
		this.manifestPath = manifestPath;
	}
}

export class ManifestReadError extends Error {
	readonly manifestPath: string;
	readonly code: string;

	constructor(manifestPath: string, cause: unknown) {
		super(`Failed to read manifest "${manifestPath}": ${errorMessage(cause)}`);
		this.name = "ManifestReadError";
		this.manifestPath = manifestPath;
		this.code = isNodeError(cause) && cause.code ? cause.code : "UNKNOWN";
	}
}

export interface RemovalFailure {
	path: string;
	code: string;
	/** 1-based index of the failing entry in the manifest. */
	position: number;
	total: number;
	/** Targets removed before the failure. */
	removed: string[];
}

export class RemovalFailedError extends Error {
	readonly path: string;
	readonly code: string;
	readonly position: number;
	readonly total: number;
	readonly removed: string[];

	constructor(failure: RemovalFailure) {
		super(`Problem when removing "${failure.path}" (${failure.code})`);
		this.name = "RemovalFailedError";
		this.path = failure.path;
		this.code = failure.code;
		this.position = failure.position;
		this.total = failure.total;
		this.removed = failure.removed;
	}
}
