import { afterEach, describe, expect, it, vi } from "vitest";
import { RpcError, TransportError } from "../../../server/mcp/mcp-errors";
import { McpSession, type McpSessionOptions } from "../../../server/mcp/mcp-session";
import {
	MOCK_ENDPOINT_URL,
	MOCK_SSE_URL,
	MockViewerServer,
	noReply,
	rpcError,
} from "../../fixtures/mock-viewer-server";
import { waitUntil } from "../../helpers/wait-until";

const sessions: McpSession[] = [];

function createSession(
	server: MockViewerServer,
	options: Partial<McpSessionOptions> = {},
): McpSession {
	const session = new McpSession({
		sseUrl: MOCK_SSE_URL,
		requestTimeoutMs: 1_000,
		endpointTimeoutMs: 500,
		fetch: server.fetch,
		...options,
	});
	sessions.push(session);
	return session;
}

async function initializedSession(
	server: MockViewerServer,
	options: Partial<McpSessionOptions> = {},
): Promise<McpSession> {
	const session = createSession(server, options);
	await session.connect();
	await session.initialize();
	return session;
}

function toolsCallsReceived(server: MockViewerServer): number {
	return server.messagesFor("tools/call").length;
}

describe("McpSession", () => {
	afterEach(async () => {
		for (const session of sessions.splice(0)) {
			await session.close();
		}
		vi.restoreAllMocks();
	});

	describe("connect", () => {
		it("discovers the submission endpoint from the endpoint event", async () => {
			const server = new MockViewerServer();
			const session = createSession(server);

			await session.connect();

			expect(session.messageEndpoint).toBe(MOCK_ENDPOINT_URL);
			expect(session.isAlive).toBe(true);
			expect(server.streamsOpened).toBe(1);
		});

		it("accepts an absolute endpoint URL", async () => {
			const server = new MockViewerServer({ announceEndpoint: false });
			const session = createSession(server);

			const connecting = session.connect();
			await waitUntil(() => server.streamsOpened === 1);
			server.pushEvent("endpoint", "http://rpc.viewer.test/submit");
			await connecting;

			expect(session.messageEndpoint).toBe("http://rpc.viewer.test/submit");
		});

		it("fails with endpoint_timeout when no endpoint event arrives", async () => {
			const server = new MockViewerServer({ announceEndpoint: false });
			const session = createSession(server, { endpointTimeoutMs: 30 });

			await expect(session.connect()).rejects.toMatchObject({
				code: "TRANSPORT_ERROR",
				reason: "endpoint_timeout",
			});
			expect(session.isAlive).toBe(false);
		});

		it("fails with stream_closed when the stream dies before the endpoint event", async () => {
			const server = new MockViewerServer({ announceEndpoint: false });
			const session = createSession(server);

			const connecting = session.connect();
			await waitUntil(() => server.streamsOpened === 1);
			server.failStream();

			await expect(connecting).rejects.toMatchObject({ reason: "stream_closed" });
		});

		it("fails and drops the stream when the endpoint event is not a URL", async () => {
			const server = new MockViewerServer({ announceEndpoint: false });
			const session = createSession(server);

			const connecting = session.connect();
			await waitUntil(() => server.streamsOpened === 1);
			server.pushEvent("endpoint", "http://[bad");

			await expect(connecting).rejects.toMatchObject({
				reason: "connect_failed",
				message: "Endpoint event carried an invalid URL: http://[bad",
			});
			expect(session.isAlive).toBe(false);
			expect(session.messageEndpoint).toBeNull();
			expect(() => server.pushEvent("endpoint", "/late")).toThrow(
				"Event stream is not open",
			);
		});

		it("fails with connect_failed when the stream cannot be opened", async () => {
			const server = new MockViewerServer();
			server.connectError = new Error("ECONNREFUSED");
			const session = createSession(server);

			const error: unknown = await session.connect().catch((err: unknown) => err);

			expect(error).toBeInstanceOf(TransportError);
			expect(error).toMatchObject({ reason: "connect_failed", retryable: true });
		});

		it("fails with connect_failed on a non-success status", async () => {
			const server = new MockViewerServer();
			const session = createSession(server, {
				sseUrl: "http://viewer.test/wrong",
			});

			await expect(session.connect()).rejects.toMatchObject({
				reason: "connect_failed",
			});
		});
	});

	describe("initialize", () => {
		it("sends initialize then the initialized notification", async () => {
			const server = new MockViewerServer();
			const session = await initializedSession(server);

			expect(server.received.map((entry) => entry.message.method)).toEqual([
				"initialize",
				"notifications/initialized",
			]);
			expect(server.received[0]?.url).toBe(MOCK_ENDPOINT_URL);
			expect(server.received[0]?.message).toMatchObject({
				jsonrpc: "2.0",
				id: 1,
				params: {
					protocolVersion: "2024-11-05",
					capabilities: {},
					clientInfo: { name: "slide-pilot", version: "0.1.0" },
				},
			});
			expect(server.received[1]?.message).not.toHaveProperty("id");
			expect(session.isInitialized).toBe(true);
			expect(session.serverInfo).toEqual({
				protocolVersion: "2024-11-05",
				capabilities: { tools: {} },
				serverInfo: { name: "mock-viewer", version: "1.0.0" },
			});
		});

		it("rejects a result without protocolVersion", async () => {
			const server = new MockViewerServer({ initializeResult: { capabilities: {} } });
			const session = createSession(server);
			await session.connect();

			await expect(session.initialize()).rejects.toMatchObject({
				code: "PROTOCOL_ERROR",
			});
			expect(session.isInitialized).toBe(false);
		});

		it("refuses other requests before the handshake", async () => {
			const server = new MockViewerServer();
			const session = createSession(server);
			await session.connect();

			await expect(
				session.sendRequest("tools/call", { name: "reset_view", arguments: {} }),
			).rejects.toMatchObject({ reason: "not_initialized" });
			expect(server.received).toHaveLength(0);
		});

		it("refuses requests before connect", async () => {
			const session = createSession(new MockViewerServer());

			await expect(session.sendRequest("initialize")).rejects.toMatchObject({
				reason: "not_connected",
			});
		});
	});

	describe("request correlation", () => {
		it("settles concurrent requests by id when responses arrive out of order", async () => {
			const server = new MockViewerServer({ tools: { slow: () => noReply() } });
			const session = await initializedSession(server);
			const count = 20;

			const requests = Array.from({ length: count }, () =>
				session.sendRequest("tools/call", { name: "slow", arguments: {} }),
			);
			await waitUntil(() => toolsCallsReceived(server) === count);
			expect(session.pendingCount).toBe(count);

			// initialize took id 1; the calls hold ids 2..21
			const ids = Array.from({ length: count }, (_, index) => index + 2);
			const answerOrder = [...ids].sort((a, b) => ((a * 7) % 23) - ((b * 7) % 23));
			expect(answerOrder).not.toEqual(ids);
			for (const id of answerOrder) {
				server.respond(id, `result-${id}`);
			}

			await expect(Promise.all(requests)).resolves.toEqual(
				ids.map((id) => `result-${id}`),
			);
			expect(session.pendingCount).toBe(0);
		});

		it("times out a request and drops its late response", async () => {
			const server = new MockViewerServer({ tools: { slow: () => noReply() } });
			const session = await initializedSession(server, { requestTimeoutMs: 30 });
			const baseline = session.pendingCount;

			await expect(
				session.sendRequest("tools/call", { name: "slow", arguments: {} }),
			).rejects.toMatchObject({ reason: "request_timeout" });
			expect(session.pendingCount).toBe(baseline);

			server.respond(2, "too late");
			const next = session.sendRequest("tools/call", { name: "slow", arguments: {} });
			await waitUntil(() => toolsCallsReceived(server) === 2);
			server.respond(3, "fresh");

			await expect(next).resolves.toBe("fresh");
			expect(session.pendingCount).toBe(baseline);
		});

		it("uses a per-call timeout over the session default", async () => {
			const server = new MockViewerServer({ tools: { slow: () => noReply() } });
			const session = await initializedSession(server, { requestTimeoutMs: 5_000 });

			await expect(
				session.sendRequest("tools/call", { name: "slow", arguments: {} }, 20),
			).rejects.toThrow("within 20ms");
		});

		it("rejects with RpcError when the response carries an error object", async () => {
			const server = new MockViewerServer({
				tools: { broken: () => rpcError(-32602, "Invalid params: zoom") },
			});
			const session = await initializedSession(server);

			const error: unknown = await session
				.sendRequest("tools/call", { name: "broken", arguments: {} })
				.catch((err: unknown) => err);

			expect(error).toBeInstanceOf(RpcError);
			expect(error).toMatchObject({
				rpcCode: -32602,
				message: "Invalid params: zoom",
				retryable: false,
			});
		});

		it("rejects with ProtocolError when a response has neither result nor error", async () => {
			const server = new MockViewerServer({ tools: { slow: () => noReply() } });
			const session = await initializedSession(server);

			const pending = session.sendRequest("tools/call", { name: "slow", arguments: {} });
			await waitUntil(() => toolsCallsReceived(server) === 1);
			server.pushMessage({ jsonrpc: "2.0", id: 2 });

			await expect(pending).rejects.toMatchObject({ code: "PROTOCOL_ERROR" });
		});

		it("fails with submit_failed when the submission is refused", async () => {
			const server = new MockViewerServer();
			const session = await initializedSession(server);
			server.submitStatus = 500;

			await expect(
				session.sendRequest("tools/call", { name: "reset_view", arguments: {} }),
			).rejects.toMatchObject({ reason: "submit_failed" });
			expect(session.pendingCount).toBe(0);
		});

		it("ignores server messages without an id", async () => {
			const server = new MockViewerServer({ tools: { slow: () => noReply() } });
			const session = await initializedSession(server);

			const pending = session.sendRequest("tools/call", { name: "slow", arguments: {} });
			await waitUntil(() => toolsCallsReceived(server) === 1);
			server.pushMessage({
				jsonrpc: "2.0",
				method: "notifications/progress",
				params: { progress: 1 },
			});
			server.pushEvent("message", "not json");
			server.respond(2, { ok: true });

			await expect(pending).resolves.toEqual({ ok: true });
		});
	});

	describe("request ids", () => {
		function submittedIds(server: MockViewerServer): unknown[] {
			return server.messagesFor("tools/call").map((message) => message.id);
		}

		it("wraps to 1 after the largest id", async () => {
			const server = new MockViewerServer({ tools: { slow: () => noReply() } });
			const session = await initializedSession(server, {
				initialRequestId: Number.MAX_SAFE_INTEGER,
			});

			const pending = session.sendRequest("tools/call", { name: "slow", arguments: {} });
			await waitUntil(() => toolsCallsReceived(server) === 1);

			expect(server.messagesFor("initialize")[0]?.id).toBe(Number.MAX_SAFE_INTEGER);
			expect(submittedIds(server)).toEqual([1]);
			server.respond(1, "wrapped");
			await expect(pending).resolves.toBe("wrapped");
		});

		it("skips abandoned ids after wrapping and drops their late responses", async () => {
			const server = new MockViewerServer({ tools: { slow: () => noReply() } });
			const session = await initializedSession(server, { maxRequestId: 3 });
			const slow = { name: "slow", arguments: {} };

			await expect(session.sendRequest("tools/call", slow, 20)).rejects.toMatchObject({
				reason: "request_timeout",
			});
			await expect(session.sendRequest("tools/call", slow, 20)).rejects.toMatchObject({
				reason: "request_timeout",
			});

			const current = session.sendRequest("tools/call", slow);
			await waitUntil(() => toolsCallsReceived(server) === 3);
			expect(submittedIds(server)).toEqual([2, 3, 1]);

			await expect(session.sendRequest("tools/call", slow)).rejects.toMatchObject({
				reason: "ids_exhausted",
			});

			// The stream is ordered: once "fresh" settles id 1, the late
			// answer for id 2 ahead of it has been dropped.
			server.respond(2, "late");
			server.respond(1, "fresh");
			await expect(current).resolves.toBe("fresh");

			const reused = session.sendRequest("tools/call", slow);
			await waitUntil(() => toolsCallsReceived(server) === 4);
			expect(submittedIds(server)).toEqual([2, 3, 1, 2]);
			server.respond(2, "again");
			await expect(reused).resolves.toBe("again");
		});

		it("forgets the oldest abandoned id past the retention limit", async () => {
			const server = new MockViewerServer({ tools: { slow: () => noReply() } });
			const session = await initializedSession(server, {
				maxRequestId: 3,
				abandonedIdRetention: 1,
			});
			const slow = { name: "slow", arguments: {} };

			for (let attempt = 0; attempt < 2; attempt += 1) {
				await expect(session.sendRequest("tools/call", slow, 20)).rejects.toMatchObject({
					reason: "request_timeout",
				});
			}

			const first = session.sendRequest("tools/call", slow);
			const second = session.sendRequest("tools/call", slow);
			await waitUntil(() => toolsCallsReceived(server) === 4);

			expect(submittedIds(server)).toEqual([2, 3, 1, 2]);
			server.respond(1, "one");
			server.respond(2, "two");
			await expect(first).resolves.toBe("one");
			await expect(second).resolves.toBe("two");
		});
	});

	describe("stream loss and close", () => {
		it("fails every pending request when the stream ends", async () => {
			const server = new MockViewerServer({ tools: { slow: () => noReply() } });
			const session = await initializedSession(server);

			const first = session.sendRequest("tools/call", { name: "slow", arguments: {} });
			const second = session.sendRequest("tools/call", { name: "slow", arguments: {} });
			await waitUntil(() => toolsCallsReceived(server) === 2);
			server.endStream();

			await expect(first).rejects.toMatchObject({ reason: "stream_closed" });
			await expect(second).rejects.toMatchObject({ reason: "stream_closed" });
			expect(session.isAlive).toBe(false);
			expect(session.pendingCount).toBe(0);
			await expect(session.sendRequest("tools/call")).rejects.toMatchObject({
				reason: "not_connected",
			});
		});

		it("close rejects pending requests and can be called twice", async () => {
			const server = new MockViewerServer({ tools: { slow: () => noReply() } });
			const session = await initializedSession(server);

			const pending = session.sendRequest("tools/call", { name: "slow", arguments: {} });
			await waitUntil(() => toolsCallsReceived(server) === 1);
			await session.close();
			await session.close();

			await expect(pending).rejects.toMatchObject({ reason: "session_closed" });
			await expect(session.sendRequest("tools/call")).rejects.toMatchObject({
				reason: "session_closed",
			});
		});
	});
});
