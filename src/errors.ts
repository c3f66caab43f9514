/** Base class of every failure the CLI reports to the user. */
export abstract class GistError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = this.constructor.name;
	}
}

/** No editor, no usable configuration file, no token. */
export class ConfigurationError extends GistError {}

/** A local input file could not be read. */
export class InputError extends GistError {}

/** The hosting API or the git remote refused or failed a request. */
export class RemoteError extends GistError {
	/** Working directory left on disk so the user can retry a failed push. */
	readonly preservedPath?: string;

	constructor(message: string, options?: ErrorOptions & { preservedPath?: string }) {
		super(message, options);
		this.preservedPath = options?.preservedPath;
	}
}

export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/** The user pressed Ctrl+C while a scoped operation was in progress. */
export class InterruptedError extends GistError {
	constructor() {
		super('Interrupted');
	}
}
