import WebSocket, { type RawData } from "ws";

/**
 * Callbacks a session registers on its socket. Binary frames are dropped
 * before they reach `message`.
 */
export interface SocketHandlers {
	open(): void;
	message(text: string): void;
	error(error: Error): void;
	close(code: number, reason: string): void;
}

/**
 * The parts of a WebSocket connection a session drives.
 */
export interface SessionSocket {
	readonly isOpen: boolean;
	/** `onSent` runs once the frame has been written, or with the write error */
	send(data: string, onSent: (error?: Error) => void): void;
	close(code: number, reason: string): void;
	terminate(): void;
}

export interface SocketOptions {
	handshakeTimeoutMs: number;
}

export type SocketFactory = (url: string, options: SocketOptions, handlers: SocketHandlers) => SessionSocket;

function rawDataToString(data: RawData): string {
	if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
	if (Buffer.isBuffer(data)) return data.toString("utf8");
	return Buffer.from(data).toString("utf8");
}

/**
 * Open a `ws` client connection.
 */
export const connectWebSocket: SocketFactory = (url, options, handlers) => {
	const socket = new WebSocket(url, { handshakeTimeout: options.handshakeTimeoutMs });
	socket.on("open", () => handlers.open());
	socket.on("message", (data, isBinary) => {
		if (!isBinary) handlers.message(rawDataToString(data));
	});
	socket.on("error", (error) => handlers.error(error));
	socket.on("close", (code, reason) => handlers.close(code, reason.toString()));

	return {
		get isOpen() {
			return socket.readyState === WebSocket.OPEN;
		},
		send: (data, onSent) => socket.send(data, onSent),
		close: (code, reason) => socket.close(code, reason),
		terminate: () => socket.terminate(),
	};
};
