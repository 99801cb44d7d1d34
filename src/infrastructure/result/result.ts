type Outcome<T> = { readonly ok: true; readonly data: T } | { readonly ok: false; readonly error: Error };

/**
 * Generic result type
 * Represents the result of an operation that can succeed or fail
 */
export class Result<T> {
	/**
	 * Creates a new result
	 * @param outcome - Data of a successful operation or error of a failed one
	 * @private
	 */
	private constructor(private readonly outcome: Outcome<T>) {}

	/**
	 * Whether the operation was successful
	 */
	get success(): boolean {
		return this.outcome.ok;
	}

	/**
	 * Result data (only available if success is true)
	 */
	get data(): T | undefined {
		return this.outcome.ok ? this.outcome.data : undefined;
	}

	/**
	 * Error information (only available if success is false)
	 */
	get error(): Error | undefined {
		return this.outcome.ok ? undefined : this.outcome.error;
	}

	/**
	 * Creates a successful result
	 * @param data - Result data
	 * @returns Successful result
	 */
	static success<T>(data: T): Result<T> {
		return new Result<T>({ ok: true, data });
	}

	/**
	 * Creates a failed result
	 * @param error - Error information
	 * @returns Failed result
	 */
	static failure<T>(error: Error): Result<T> {
		return new Result<T>({ ok: false, error });
	}

	/**
	 * Maps the result data to a new type
	 * @param fn - Mapping function
	 * @returns Mapped result
	 */
	map<U>(fn: (data: T) => U): Result<U> {
		if (this.outcome.ok) {
			return Result.success(fn(this.outcome.data));
		}
		return Result.failure<U>(this.outcome.error);
	}

	/**
	 * Executes a callback if the result is successful
	 * @param fn - Callback function
	 * @returns This result
	 */
	onSuccess(fn: (data: T) => void): Result<T> {
		if (this.outcome.ok) {
			fn(this.outcome.data);
		}
		return this;
	}

	/**
	 * Executes a callback if the result is a failure
	 * @param fn - Callback function
	 * @returns This result
	 */
	onFailure(fn: (error: Error) => void): Result<T> {
		if (!this.outcome.ok) {
			fn(this.outcome.error);
		}
		return this;
	}
}
