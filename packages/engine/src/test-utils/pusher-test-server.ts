import WebSocket, { type RawData, WebSocketServer } from "ws";

/**
 * How the server answers a subscribe:
 * - `always`: ack once
 * - `twice`: ack twice (duplicate acks)
 * - `never`: stay silent
 * - `reject`: reply with `pusher:error`
 * - `close`: drop the connection
 */
export type AckPolicy = "always" | "twice" | "never" | "reject" | "close";

export interface PusherTestServerOptions {
	/** Policy for the first subscribe on each connection */
	subscribe?: AckPolicy;
	/** Policy for later subscribes (filter updates) on the same connection */
	update?: AckPolicy;
	/** Send `pusher:connection_established` on connect. Defaults to true. */
	establish?: boolean;
}

export interface ReceivedSubscribe {
	connection: number;
	channel: string;
	filter: unknown;
	isUpdate: boolean;
}

interface ConnectionState {
	id: number;
	subscribes: number;
	channels: Set<string>;
}

function toText(data: RawData): string {
	if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
	if (Buffer.isBuffer(data)) return data.toString("utf8");
	return Buffer.from(data).toString("utf8");
}

function parseSubscribe(text: string): { channel: string; filter: unknown } | null {
	let message: unknown;
	try {
		message = JSON.parse(text);
	} catch {
		return null;
	}
	if (typeof message !== "object" || message === null || !("event" in message) || message.event !== "pusher:subscribe") return null;
	if (!("data" in message) || typeof message.data !== "object" || message.data === null) return null;
	const data = message.data;
	if (!("channel" in data) || typeof data.channel !== "string") return null;
	return { channel: data.channel, filter: "filter" in data ? data.filter : undefined };
}

/**
 * A minimal in-process Pusher endpoint for tests. Listens on an ephemeral
 * port on the loopback interface.
 */
export class PusherTestServer {
	readonly received: ReceivedSubscribe[] = [];
	/** Text frames that were not subscribes (pongs and the like) */
	readonly other: string[] = [];
	private readonly connections = new Map<WebSocket, ConnectionState>();
	private readonly waiters: Array<{ count: number; resolve: () => void }> = [];
	private nextConnection = 0;

	private constructor(
		private readonly wss: WebSocketServer,
		private readonly options: PusherTestServerOptions,
	) {
		wss.on("connection", (socket) => this.handleConnection(socket));
	}

	static start(options: PusherTestServerOptions = {}): Promise<PusherTestServer> {
		return new Promise((resolve, reject) => {
			const wss = new WebSocketServer({ host: "127.0.0.1", port: 0 });
			wss.once("error", reject);
			wss.once("listening", () => resolve(new PusherTestServer(wss, options)));
		});
	}

	get port(): number {
		const address = this.wss.address();
		if (typeof address === "string") throw new Error(`Unexpected pipe address ${address}`);
		return address.port;
	}

	get host(): string {
		return "127.0.0.1";
	}

	/** Number of connections accepted so far */
	get connectionCount(): number {
		return this.nextConnection;
	}

	/** Number of currently open connections */
	get openConnections(): number {
		return this.connections.size;
	}

	/**
	 * Resolve once `count` subscribes (initial or update) have arrived.
	 */
	waitForSubscribes(count: number, timeoutMs = 2000): Promise<void> {
		if (this.received.length >= count) return Promise.resolve();
		return new Promise((resolve, reject) => {
			const timer = setTimeout(() => reject(new Error(`Timed out waiting for ${count} subscribes (got ${this.received.length})`)), timeoutMs);
			this.waiters.push({
				count,
				resolve: () => {
					clearTimeout(timer);
					resolve();
				},
			});
		});
	}

	/**
	 * Send a channel event to every connection subscribed to `channel`.
	 * @returns Number of connections the event was sent to
	 */
	publish(channel: string, event: string, data: unknown): number {
		const frame = JSON.stringify({ event, channel, data: JSON.stringify(data) });
		let sent = 0;
		for (const [socket, state] of this.connections) {
			if (state.channels.has(channel) && socket.readyState === WebSocket.OPEN) {
				socket.send(frame);
				sent++;
			}
		}
		return sent;
	}

	/** Send a raw text frame to every open connection */
	broadcast(text: string): void {
		for (const socket of this.connections.keys()) {
			if (socket.readyState === WebSocket.OPEN) socket.send(text);
		}
	}

	/** Drop every connection without a close handshake */
	dropAll(): void {
		for (const socket of this.connections.keys()) socket.terminate();
	}

	close(): Promise<void> {
		this.dropAll();
		return new Promise((resolve, reject) => {
			this.wss.close((error) => (error ? reject(error) : resolve()));
		});
	}

	private handleConnection(socket: WebSocket): void {
		const state: ConnectionState = { id: this.nextConnection++, subscribes: 0, channels: new Set() };
		this.connections.set(socket, state);
		socket.on("close", () => this.connections.delete(socket));
		socket.on("error", () => socket.terminate());
		socket.on("message", (data) => this.handleMessage(socket, state, toText(data)));

		if (this.options.establish ?? true) {
			socket.send(
				JSON.stringify({
					event: "pusher:connection_established",
					data: JSON.stringify({ socket_id: `${state.id}.1`, activity_timeout: 120 }),
				}),
			);
		}
	}

	private handleMessage(socket: WebSocket, state: ConnectionState, text: string): void {
		const subscribe = parseSubscribe(text);
		if (!subscribe) {
			this.other.push(text);
			return;
		}

		const isUpdate = state.subscribes > 0;
		state.subscribes++;
		this.received.push({ connection: state.id, channel: subscribe.channel, filter: subscribe.filter, isUpdate });
		this.notifyWaiters();

		const policy = (isUpdate ? this.options.update : this.options.subscribe) ?? "always";
		const ack = JSON.stringify({ event: "pusher_internal:subscription_succeeded", channel: subscribe.channel, data: "{}" });
		switch (policy) {
			case "always":
				state.channels.add(subscribe.channel);
				socket.send(ack);
				break;
			case "twice":
				state.channels.add(subscribe.channel);
				socket.send(ack);
				socket.send(ack);
				break;
			case "never":
				break;
			case "reject":
				socket.send(JSON.stringify({ event: "pusher:error", data: { message: "Invalid filter", code: 4301 } }));
				break;
			case "close":
				socket.terminate();
				break;
		}
	}

	private notifyWaiters(): void {
		for (let i = this.waiters.length - 1; i >= 0; i--) {
			const waiter = this.waiters[i];
			if (waiter && this.received.length >= waiter.count) {
				this.waiters.splice(i, 1);
				waiter.resolve();
			}
		}
	}
}
