import type { SessionSocket, SocketHandlers } from "../session/socket.js";

export interface FakeSocketOptions {
	/** Answer `close()` with a close event, as a live server does. Defaults to true. */
	answerClose?: boolean;
}

/**
 * Scripted socket for driving a session without a server. Sent frames are
 * only reported as written once `flush()` is called.
 */
export class FakeSocket implements SessionSocket {
	isOpen = false;
	readonly sent: string[] = [];
	private readonly pendingWrites: Array<() => void> = [];
	private closed = false;

	constructor(
		private readonly handlers: SocketHandlers,
		private readonly options: FakeSocketOptions = {},
	) {}

	open(): void {
		this.isOpen = true;
		this.handlers.open();
	}

	receive(frame: string | object): void {
		this.handlers.message(typeof frame === "string" ? frame : JSON.stringify(frame));
	}

	flush(): void {
		for (const complete of this.pendingWrites.splice(0)) complete();
	}

	send(data: string, onSent: (error?: Error) => void): void {
		this.sent.push(data);
		this.pendingWrites.push(() => onSent());
	}

	close(code: number, reason: string): void {
		this.isOpen = false;
		if (this.options.answerClose !== false) this.emitClose(code, reason);
	}

	terminate(): void {
		this.isOpen = false;
		this.emitClose(1006, "");
	}

	private emitClose(code: number, reason: string): void {
		if (this.closed) return;
		this.closed = true;
		this.handlers.close(code, reason);
	}
}
