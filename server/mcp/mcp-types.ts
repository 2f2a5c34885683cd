/** JSON-RPC 2.0 request */
export interface JsonRpcRequest {
	jsonrpc: "2.0";
	id: number;
	method: string;
	params?: Record<string, unknown>;
}

/** JSON-RPC 2.0 error object */
export interface JsonRpcErrorObject {
	code: number;
	message: string;
	data?: unknown;
}

/** JSON-RPC 2.0 notification (no id) */
export interface JsonRpcNotification {
	jsonrpc: "2.0";
	method: string;
	params?: Record<string, unknown>;
}

export const MCP_PROTOCOL_VERSION = "2024-11-05";

export interface ClientInfo {
	name: string;
	version: string;
}

/** initialize params */
export interface McpInitializeParams {
	protocolVersion: string;
	capabilities: Record<string, unknown>;
	clientInfo: ClientInfo;
}

/** initialize result */
export interface McpInitializeResult {
	protocolVersion: string;
	capabilities: Record<string, unknown>;
	serverInfo?: { name: string; version?: string };
}

/** Anything that can carry a request to the tool server and hand back its
 *  correlated result. */
export interface RpcChannel {
	sendRequest(
		method: string,
		params?: Record<string, unknown>,
		timeoutMs?: number,
	): Promise<unknown>;
}

/** The subset of fetch the session relies on. */
export type FetchLike = (
	url: string,
	init?: {
		method?: string;
		headers?: Record<string, string>;
		body?: string;
		signal?: AbortSignal;
	},
) => Promise<Response>;

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}
