import type { SessionReport } from "./session-state.js";

/**
 * What the RampController needs from a session.
 */
export interface ISession {
	readonly id: number;

	/**
	 * Drive the session until it is terminal. Never rejects: failures are
	 * recorded as metrics and reflected in the report.
	 */
	run(): Promise<SessionReport>;

	/**
	 * Cancellation: close promptly from whatever state the session is in.
	 */
	close(): void;

	/**
	 * Forced closure at the run deadline. Settles `run()` immediately.
	 * @returns false when the session had already finished
	 */
	terminate(): boolean;
}

export type SessionFactory = (index: number) => ISession;
