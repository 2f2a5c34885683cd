import type { Logger } from "../logger";
import { createSilentLogger } from "../logger";
import { errorMessage } from "../errors";
import { ProtocolError, RpcError, TransportError } from "./mcp-errors";
import type {
	ClientInfo,
	FetchLike,
	JsonRpcNotification,
	JsonRpcRequest,
	McpInitializeParams,
	McpInitializeResult,
	RpcChannel,
} from "./mcp-types";
import { MCP_PROTOCOL_VERSION, isRecord } from "./mcp-types";
import { SseParser, type SseEvent } from "./sse-parser";
import { APP_NAME, APP_VERSION } from "../version";

type PendingRequest = {
	method: string;
	resolve: (value: unknown) => void;
	reject: (error: Error) => void;
	timer: ReturnType<typeof setTimeout>;
};

type EndpointWaiter = {
	resolve: (endpoint: URL) => void;
	reject: (error: Error) => void;
};

export interface McpSessionOptions {
	/** URL of the inbound event stream */
	sseUrl: string;
	requestTimeoutMs?: number;
	endpointTimeoutMs?: number;
	clientInfo?: ClientInfo;
	/** How many timed-out request ids to remember so their late responses
	 *  can be recognised and dropped. */
	abandonedIdRetention?: number;
	/** First request id to hand out. Default 1. */
	initialRequestId?: number;
	/** Ids wrap back to 1 after this value. Default `Number.MAX_SAFE_INTEGER`. */
	maxRequestId?: number;
	fetch?: FetchLike;
	logger?: Logger;
}

const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
const DEFAULT_ENDPOINT_TIMEOUT_MS = 10_000;
const DEFAULT_ABANDONED_ID_RETENTION = 256;
const DEFAULT_CLIENT_INFO: ClientInfo = { name: APP_NAME, version: APP_VERSION };

/**
 * One connection to the viewer's tool server.
 *
 * Requests are POSTed to an endpoint the server announces on its event
 * stream; their responses come back only on that stream. A single
 * background listener reads the stream and settles the waiter whose id
 * matches each response. The pending map is touched only from the event
 * loop, so no further locking is needed around it.
 */
export class McpSession implements RpcChannel {
	private nextId: number;
	private readonly pendingRequests = new Map<number, PendingRequest>();
	private readonly abandonedIds = new Set<number>();
	private endpoint: URL | null = null;
	private endpointWaiter: EndpointWaiter | null = null;
	private streamAbort: AbortController | null = null;
	private listenerDone: Promise<void> | null = null;
	private alive = false;
	private closed = false;
	private initialized = false;
	private serverDetails: McpInitializeResult | null = null;
	private readonly parser = new SseParser();
	private readonly textDecoder = new TextDecoder();
	private readonly fetchImpl: FetchLike;
	private readonly logger: Logger;
	private readonly requestTimeoutMs: number;
	private readonly endpointTimeoutMs: number;
	private readonly abandonedIdRetention: number;
	private readonly maxRequestId: number;
	private readonly clientInfo: ClientInfo;

	constructor(private readonly options: McpSessionOptions) {
		this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
		this.logger = (options.logger ?? createSilentLogger()).child({
			component: "mcp-session",
		});
		this.requestTimeoutMs =
			options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
		this.endpointTimeoutMs =
			options.endpointTimeoutMs ?? DEFAULT_ENDPOINT_TIMEOUT_MS;
		this.abandonedIdRetention =
			options.abandonedIdRetention ?? DEFAULT_ABANDONED_ID_RETENTION;
		this.maxRequestId = options.maxRequestId ?? Number.MAX_SAFE_INTEGER;
		this.nextId = options.initialRequestId ?? 1;
		this.clientInfo = options.clientInfo ?? DEFAULT_CLIENT_INFO;
	}

	/** Open the event stream and wait for the server to announce where
	 *  requests must be submitted. */
	async connect(): Promise<void> {
		if (this.closed) {
			throw new TransportError("session_closed", "Session closed");
		}
		if (this.streamAbort) {
			throw new TransportError("connect_failed", "Session already connected");
		}

		const abort = new AbortController();
		this.streamAbort = abort;
		const endpointReady = new Promise<URL>((resolve, reject) => {
			this.endpointWaiter = { resolve, reject };
		});

		let response: Response;
		try {
			response = await this.fetchImpl(this.options.sseUrl, {
				method: "GET",
				headers: { Accept: "text/event-stream" },
				signal: abort.signal,
			});
		} catch (error: unknown) {
			this.endpointWaiter = null;
			throw new TransportError(
				"connect_failed",
				`Could not open event stream at ${this.options.sseUrl}: ${errorMessage(error)}`,
				error,
			);
		}

		if (!response.ok || !response.body) {
			this.endpointWaiter = null;
			abort.abort();
			throw new TransportError(
				"connect_failed",
				`Event stream at ${this.options.sseUrl} answered ${response.status}`,
			);
		}

		this.alive = true;
		this.listenerDone = this.listen(response.body);

		let timer: ReturnType<typeof setTimeout> | undefined;
		const timeout = new Promise<"timeout">((resolve) => {
			timer = setTimeout(() => resolve("timeout"), this.endpointTimeoutMs);
		});

		try {
			const outcome = await Promise.race([endpointReady, timeout]);
			if (outcome === "timeout") {
				this.endpointWaiter = null;
				this.alive = false;
				abort.abort();
				throw new TransportError(
					"endpoint_timeout",
					`No endpoint event within ${this.endpointTimeoutMs}ms`,
				);
			}
			this.logger.info({ endpoint: outcome.href }, "Event stream connected");
		} finally {
			clearTimeout(timer);
		}
	}

	/** initialize handshake followed by the initialized notification. */
	async initialize(): Promise<McpInitializeResult> {
		const params: McpInitializeParams = {
			protocolVersion: MCP_PROTOCOL_VERSION,
			capabilities: {},
			clientInfo: this.clientInfo,
		};
		const result = await this.sendRequest("initialize", { ...params });
		if (!isRecord(result) || typeof result.protocolVersion !== "string") {
			throw new ProtocolError("initialize returned no protocolVersion");
		}

		this.serverDetails = {
			protocolVersion: result.protocolVersion,
			capabilities: isRecord(result.capabilities) ? result.capabilities : {},
			...(isRecord(result.serverInfo) &&
			typeof result.serverInfo.name === "string"
				? {
						serverInfo: {
							name: result.serverInfo.name,
							...(typeof result.serverInfo.version === "string"
								? { version: result.serverInfo.version }
								: {}),
						},
					}
				: {}),
		};
		await this.sendNotification("notifications/initialized");
		this.initialized = true;
		this.logger.info(
			{ protocolVersion: result.protocolVersion },
			"Session initialized",
		);
		return this.serverDetails;
	}

	/**
	 * Submit a request and wait for its correlated response.
	 *
	 * The waiter leaves the pending map exactly once: when the listener
	 * settles it, when submission fails, or when the timeout fires. A
	 * timeout only abandons the local wait; the remote side may still act.
	 */
	async sendRequest(
		method: string,
		params?: Record<string, unknown>,
		timeoutMs?: number,
	): Promise<unknown> {
		const endpoint = this.requireEndpoint();
		if (!this.initialized && method !== "initialize") {
			throw new TransportError(
				"not_initialized",
				`Cannot send ${method} before the initialize handshake completes`,
			);
		}

		const id = this.allocateId();
		const request: JsonRpcRequest = {
			jsonrpc: "2.0",
			id,
			method,
			...(params ? { params } : {}),
		};
		const effectiveTimeout = timeoutMs ?? this.requestTimeoutMs;

		return new Promise<unknown>((resolve, reject) => {
			const timer = setTimeout(() => {
				const pending = this.takePending(id);
				if (!pending) {
					return;
				}
				this.rememberAbandoned(id);
				this.logger.warn({ id, method }, "Request timed out");
				pending.reject(
					new TransportError(
						"request_timeout",
						`No response to ${method} (id ${id}) within ${effectiveTimeout}ms`,
					),
				);
			}, effectiveTimeout);

			this.pendingRequests.set(id, { method, resolve, reject, timer });

			void this.submit(endpoint, request).catch((error: unknown) => {
				const pending = this.takePending(id);
				pending?.reject(
					error instanceof TransportError
						? error
						: new TransportError("submit_failed", errorMessage(error), error),
				);
			});
		});
	}

	/** Fire-and-forget: no id, no waiter, no response. */
	async sendNotification(
		method: string,
		params?: Record<string, unknown>,
	): Promise<void> {
		const endpoint = this.requireEndpoint();
		const notification: JsonRpcNotification = {
			jsonrpc: "2.0",
			method,
			...(params ? { params } : {}),
		};
		await this.submit(endpoint, notification);
	}

	/** Abort the stream and fail every outstanding waiter. Safe to call twice. */
	async close(): Promise<void> {
		if (this.closed) {
			return;
		}
		this.closed = true;
		this.alive = false;
		this.streamAbort?.abort();

		const closedError = new TransportError("session_closed", "Session closed");
		if (this.endpointWaiter) {
			this.endpointWaiter.reject(closedError);
			this.endpointWaiter = null;
		}
		this.rejectAllPending(closedError);

		if (this.listenerDone) {
			await this.listenerDone;
		}
		this.logger.info("Session closed");
	}

	get pendingCount(): number {
		return this.pendingRequests.size;
	}

	get isAlive(): boolean {
		return this.alive;
	}

	get isInitialized(): boolean {
		return this.initialized;
	}

	get serverInfo(): McpInitializeResult | null {
		return this.serverDetails;
	}

	get messageEndpoint(): string | null {
		return this.endpoint?.href ?? null;
	}

	private requireEndpoint(): URL {
		if (this.closed) {
			throw new TransportError("session_closed", "Session closed");
		}
		if (!this.alive || !this.endpoint) {
			throw new TransportError(
				"not_connected",
				"Session is not connected to the tool server",
			);
		}
		return this.endpoint;
	}

	private allocateId(): number {
		let id = this.nextId;
		let skipped = 0;
		while (this.pendingRequests.has(id) || this.abandonedIds.has(id)) {
			skipped += 1;
			if (skipped >= this.maxRequestId) {
				throw new TransportError(
					"ids_exhausted",
					"Every request id is pending or abandoned",
				);
			}
			id = this.followingId(id);
		}
		this.nextId = this.followingId(id);
		return id;
	}

	private followingId(id: number): number {
		return id >= this.maxRequestId ? 1 : id + 1;
	}

	private takePending(id: number): PendingRequest | undefined {
		const pending = this.pendingRequests.get(id);
		if (!pending) {
			return undefined;
		}
		this.pendingRequests.delete(id);
		clearTimeout(pending.timer);
		return pending;
	}

	private rememberAbandoned(id: number): void {
		this.abandonedIds.add(id);
		while (this.abandonedIds.size > this.abandonedIdRetention) {
			const oldest = this.abandonedIds.values().next();
			if (oldest.done) {
				break;
			}
			this.abandonedIds.delete(oldest.value);
		}
	}

	private async submit(
		endpoint: URL,
		message: JsonRpcRequest | JsonRpcNotification,
	): Promise<void> {
		let response: Response;
		try {
			response = await this.fetchImpl(endpoint.href, {
				method: "POST",
				headers: { "Content-Type": "application/json" },
				body: JSON.stringify(message),
			});
		} catch (error: unknown) {
			throw new TransportError(
				"submit_failed",
				`Could not submit ${message.method}: ${errorMessage(error)}`,
				error,
			);
		}

		// The reply body carries nothing; responses arrive on the stream.
		await response.text();
		if (!response.ok) {
			throw new TransportError(
				"submit_failed",
				`Submitting ${message.method} returned ${response.status}`,
			);
		}
	}

	private async listen(body: ReadableStream<Uint8Array>): Promise<void> {
		const reader = body.getReader();
		try {
			for (;;) {
				const { done, value } = await reader.read();
				if (done) {
					break;
				}
				const text = this.textDecoder.decode(value, { stream: true });
				for (const event of this.parser.push(text)) {
					this.handleEvent(event);
				}
			}

			const tail = this.textDecoder.decode();
			for (const event of this.parser.push(tail)) {
				this.handleEvent(event);
			}
			for (const event of this.parser.flush()) {
				this.handleEvent(event);
			}

			if (!this.closed) {
				this.fail(new TransportError("stream_closed", "Event stream ended"));
			}
		} catch (error: unknown) {
			if (!this.closed) {
				this.fail(
					new TransportError(
						"stream_closed",
						`Event stream failed: ${errorMessage(error)}`,
						error,
					),
				);
			}
		}
	}

	private handleEvent(event: SseEvent): void {
		if (event.event === "endpoint") {
			this.handleEndpoint(event.data);
			return;
		}
		if (event.event !== "message") {
			this.logger.debug({ event: event.event }, "Ignoring stream event");
			return;
		}

		let message: unknown;
		try {
			message = JSON.parse(event.data);
		} catch (error: unknown) {
			this.logger.warn(
				{ error: errorMessage(error) },
				"Dropping unparseable message event",
			);
			return;
		}

		if (!isRecord(message)) {
			this.logger.warn("Dropping non-object message event");
			return;
		}

		const id = message.id;
		if (typeof id !== "number") {
			// Server-initiated notifications carry no id; nothing waits on them.
			this.logger.debug(
				{ method: message.method },
				"Ignoring message without request id",
			);
			return;
		}

		this.handleResponse(id, message);
	}

	private handleEndpoint(data: string): void {
		if (this.endpoint) {
			this.logger.warn({ data }, "Ignoring repeated endpoint event");
			return;
		}

		let endpoint: URL;
		try {
			endpoint = new URL(data.trim(), this.options.sseUrl);
		} catch (error: unknown) {
			const err = new TransportError(
				"connect_failed",
				`Endpoint event carried an invalid URL: ${data}`,
				error,
			);
			this.alive = false;
			this.streamAbort?.abort();
			this.endpointWaiter?.reject(err);
			this.endpointWaiter = null;
			return;
		}

		this.endpoint = endpoint;
		this.endpointWaiter?.resolve(endpoint);
		this.endpointWaiter = null;
	}

	private handleResponse(id: number, message: Record<string, unknown>): void {
		const pending = this.takePending(id);
		if (!pending) {
			if (this.abandonedIds.delete(id)) {
				this.logger.debug({ id }, "Discarding late response to abandoned request");
			} else {
				this.logger.warn({ id }, "Discarding response with unknown id");
			}
			return;
		}

		const error = message.error;
		if (error !== undefined) {
			if (
				isRecord(error) &&
				typeof error.code === "number" &&
				typeof error.message === "string"
			) {
				pending.reject(new RpcError(error.code, error.message, error.data));
				return;
			}
			pending.reject(
				new ProtocolError(
					`Malformed error object in response to ${pending.method} (id ${id})`,
				),
			);
			return;
		}

		if (!("result" in message)) {
			pending.reject(
				new ProtocolError(
					`Response to ${pending.method} (id ${id}) carries neither result nor error`,
				),
			);
			return;
		}

		pending.resolve(message.result);
	}

	private fail(error: TransportError): void {
		this.alive = false;
		this.logger.error({ error: error.message }, "Event stream lost");
		if (this.endpointWaiter) {
			this.endpointWaiter.reject(error);
			this.endpointWaiter = null;
		}
		this.rejectAllPending(error);
	}

	private rejectAllPending(error: Error): void {
		const pending = [...this.pendingRequests.keys()];
		for (const id of pending) {
			this.takePending(id)?.reject(error);
		}
	}
}
