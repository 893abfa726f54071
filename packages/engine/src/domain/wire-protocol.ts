import type { SubscriptionFilter } from "./filter.js";

/**
 * Connection parameters a protocol turns into a WebSocket URL.
 */
export interface EndpointOptions {
	host: string;
	port: number;
	appKey: string;
	secure: boolean;
}

/**
 * A subscribe (or replacement subscribe) request.
 */
export interface SubscribeRequest {
	channel: string;
	filter: SubscriptionFilter;
}

/**
 * Inbound frames, decoded into the closed set the session state machine
 * understands. Anything else is `unknown` and ignored.
 */
export type InboundFrame =
	| { type: "connection-established"; socketId?: string }
	| { type: "subscribe-ack"; channel?: string }
	| { type: "subscribe-error"; channel?: string; message: string }
	| { type: "ping"; reply: string }
	| { type: "data"; channel?: string; event: string; publishedAtMs?: number }
	| { type: "unknown"; raw: string };

/**
 * The server's message schema. Sessions never look inside payloads; the
 * schema is chosen at configuration time.
 */
export interface IWireProtocol {
	/** Human-readable name, used in logs and result files. */
	readonly name: string;

	/**
	 * Build the WebSocket URL. Protocols that authenticate with the app key
	 * on connection put it here.
	 */
	buildUrl(endpoint: EndpointOptions): string;

	/**
	 * Encode a subscribe request. Filter updates reuse the same framing.
	 */
	encodeSubscribe(request: SubscribeRequest): string;

	/**
	 * Decode a raw text frame. Must not throw.
	 */
	decode(raw: string): InboundFrame;
}
