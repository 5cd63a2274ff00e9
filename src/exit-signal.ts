export class ExitSignal extends Error {
	readonly code: number;

	constructor(code: number) {
		super(`exit:${code}`);
		this.name = "ExitSignal";
		this.code = code;
	}
}

export function withExitSignal<A extends unknown[]>(
	fn: (...args: A) => Promise<void>,
): (...args: A) => Promise<void> {
	return async (...args: A) => {
		try {
			await fn(...args);
		} catch (err) {
			if (err instanceof ExitSignal) {
				return process.exit(err.code);
			}
			throw err;
		}
	};
}
