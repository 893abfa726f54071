import type { EndpointOptions, InboundFrame, IWireProtocol, SubscribeRequest } from "../domain/wire-protocol.js";

const EVENT_CONNECTION_ESTABLISHED = "pusher:connection_established";
const EVENT_SUBSCRIBE = "pusher:subscribe";
const EVENT_SUBSCRIPTION_SUCCEEDED = "pusher_internal:subscription_succeeded";
const EVENT_SUBSCRIPTION_ERROR = "pusher:subscription_error";
const EVENT_ERROR = "pusher:error";
const EVENT_PING = "pusher:ping";
const EVENT_PONG = "pusher:pong";

const PONG_FRAME = JSON.stringify({ event: EVENT_PONG, data: {} });

type FilterPayload = { key: string; cmp: "eq"; val: string } | { key: string; cmp: "in"; vals: string[] };

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJson(raw: string): unknown {
	try {
		return JSON.parse(raw);
	} catch {
		return undefined;
	}
}

/**
 * Pusher nests `data` either as an object or as a JSON-encoded string.
 */
function unwrapData(data: unknown): unknown {
	return typeof data === "string" ? (parseJson(data) ?? data) : data;
}

function toTimestamp(value: unknown): number | undefined {
	if (typeof value === "number" && Number.isFinite(value) && value >= 0) return value;
	if (typeof value === "string" && /^\d+$/.test(value)) return Number.parseInt(value, 10);
	return undefined;
}

/**
 * Publish time (epoch ms) of a channel message: root `tags.timestamp`, then
 * `data.tags.timestamp`, then `data.timestamp`.
 */
export function extractTimestamp(message: JsonObject): number | undefined {
	if (isObject(message.tags)) {
		const ts = toTimestamp(message.tags.timestamp);
		if (ts !== undefined) return ts;
	}

	const data = unwrapData(message.data);
	if (isObject(data)) {
		if (isObject(data.tags)) {
			const ts = toTimestamp(data.tags.timestamp);
			if (ts !== undefined) return ts;
		}
		return toTimestamp(data.timestamp);
	}

	return undefined;
}

function errorMessage(data: unknown): string {
	const unwrapped = unwrapData(data);
	if (isObject(unwrapped)) {
		const message = typeof unwrapped.message === "string" ? unwrapped.message : JSON.stringify(unwrapped);
		return typeof unwrapped.code === "number" ? `${message} (code ${unwrapped.code})` : message;
	}
	return typeof unwrapped === "string" ? unwrapped : "unknown error";
}

/**
 * Pusher-style framing with tag filters.
 *
 * The app key goes in the URL path; the server answers with
 * `pusher:connection_established`, after which the client sends
 * `pusher:subscribe` carrying the channel and its filter. A repeated
 * subscribe on the same channel replaces the filter.
 */
export class PusherProtocol implements IWireProtocol {
	readonly name = "pusher";

	buildUrl({ host, port, appKey, secure }: EndpointOptions): string {
		return `${secure ? "wss" : "ws"}://${host}:${port}/app/${encodeURIComponent(appKey)}`;
	}

	encodeSubscribe({ channel, filter }: SubscribeRequest): string {
		const [first] = filter.values;
		const payload: FilterPayload =
			filter.mode === "equals" && first !== undefined ? { key: filter.key, cmp: "eq", val: first } : { key: filter.key, cmp: "in", vals: filter.values };

		return JSON.stringify({
			event: EVENT_SUBSCRIBE,
			data: { channel, filter: payload },
		});
	}

	decode(raw: string): InboundFrame {
		if (raw === "ping") return { type: "ping", reply: "pong" };

		const message = parseJson(raw);
		if (!isObject(message) || typeof message.event !== "string") {
			return { type: "unknown", raw };
		}

		const channel = typeof message.channel === "string" ? message.channel : undefined;

		switch (message.event) {
			case EVENT_CONNECTION_ESTABLISHED: {
				const data = unwrapData(message.data);
				const socketId = isObject(data) && typeof data.socket_id === "string" ? data.socket_id : undefined;
				return { type: "connection-established", socketId };
			}
			case EVENT_SUBSCRIPTION_SUCCEEDED:
				return { type: "subscribe-ack", channel };
			case EVENT_SUBSCRIPTION_ERROR:
			case EVENT_ERROR:
				return { type: "subscribe-error", channel, message: errorMessage(message.data) };
			case EVENT_PING:
				return { type: "ping", reply: PONG_FRAME };
			case EVENT_PONG:
				return { type: "unknown", raw };
			default:
				return { type: "data", channel, event: message.event, publishedAtMs: extractTimestamp(message) };
		}
	}
}
