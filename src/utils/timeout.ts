export class TimeoutError extends Error {
	constructor(readonly ms: number) {
		super(`Operation timed out after ${ms}ms`);
		this.name = "TimeoutError";
	}
}

/**
 * Race `promise` against a timer. The timer is cleared as soon as the
 * promise settles, so nothing is left scheduled on the event loop.
 */
export function withTimeout<T>(promise: PromiseLike<T>, ms: number): Promise<T> {
	return new Promise<T>((resolve, reject) => {
		const timer = setTimeout(() => reject(new TimeoutError(ms)), ms);
		promise.then(
			(value) => {
				clearTimeout(timer);
				resolve(value);
			},
			(error: unknown) => {
				clearTimeout(timer);
				reject(error);
			},
		);
	});
}
