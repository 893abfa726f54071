export enum ErrorCode {
	// Connection errors
	CONNECTION_REFUSED = "CONNECTION_REFUSED",
	CONNECTION_TIMEOUT = "CONNECTION_TIMEOUT",
	CONNECTION_CLOSED = "CONNECTION_CLOSED",
	CONNECTION_ABORTED = "CONNECTION_ABORTED",

	// Subscribe errors
	SUBSCRIBE_REJECTED = "SUBSCRIBE_REJECTED",
	SUBSCRIBE_TIMEOUT = "SUBSCRIBE_TIMEOUT",
	SUBSCRIBE_CANCELLED = "SUBSCRIBE_CANCELLED",

	// Update errors
	UPDATE_REJECTED = "UPDATE_REJECTED",
	UPDATE_TIMEOUT = "UPDATE_TIMEOUT",
	UPDATE_CANCELLED = "UPDATE_CANCELLED",

	// Configuration errors
	INVALID_SCENARIO = "INVALID_SCENARIO",
	INVALID_CONFIG = "INVALID_CONFIG",
	HOST_UNRESOLVABLE = "HOST_UNRESOLVABLE",
	TOKEN_FILE_INVALID = "TOKEN_FILE_INVALID",
}

export class BenchmarkError extends Error {
	constructor(
		public readonly code: ErrorCode,
		message?: string,
	) {
		super(message || code);
		this.name = code;
	}
}

/** Transport-level failure before a session reaches the active state. */
export class ConnectionError extends BenchmarkError {}
/** Rejection, ack timeout or cancellation of the initial subscribe. */
export class SubscribeFailure extends BenchmarkError {}
/** Rejection, ack timeout or cancellation of a live filter update. */
export class UpdateFailure extends BenchmarkError {}
/** Invalid run configuration. Aborts the run before any session is created. */
export class FatalConfigurationError extends BenchmarkError {}
