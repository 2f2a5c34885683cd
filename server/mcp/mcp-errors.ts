export const JSON_RPC_ERROR_CODES = {
	PARSE_ERROR: -32700,
	INVALID_REQUEST: -32600,
	METHOD_NOT_FOUND: -32601,
	INVALID_PARAMS: -32602,
	INTERNAL_ERROR: -32603,
	SERVER_ERROR_MIN: -32099,
	SERVER_ERROR_MAX: -32000,
} as const;

export type McpErrorCode =
	| "TRANSPORT_ERROR"
	| "PROTOCOL_ERROR"
	| "RPC_ERROR"
	| "TOOL_ERROR"
	| "NOT_IMPLEMENTED"
	| "STEP_PRECONDITION"
	| "COMPLETION_TIMEOUT";

export type TransportFailureReason =
	| "connect_failed"
	| "endpoint_timeout"
	| "submit_failed"
	| "request_timeout"
	| "stream_closed"
	| "session_closed"
	| "not_connected"
	| "not_initialized"
	| "ids_exhausted";

const NOT_IMPLEMENTED_MARKER = "not yet implemented";

export class McpError extends Error {
	readonly code: McpErrorCode;
	readonly retryable: boolean;
	readonly cause?: unknown;

	constructor(
		code: McpErrorCode,
		message: string,
		options?: { retryable?: boolean; cause?: unknown },
	) {
		super(message);
		this.name = "McpError";
		this.code = code;
		this.retryable = options?.retryable ?? false;
		this.cause = options?.cause;
	}
}

/** Connection or stream failure, missing endpoint, or no answer in time.
 *  Retryable at the caller's discretion; the transport never retries. */
export class TransportError extends McpError {
	readonly reason: TransportFailureReason;

	constructor(reason: TransportFailureReason, message: string, cause?: unknown) {
		super("TRANSPORT_ERROR", message, { retryable: true, cause });
		this.name = "TransportError";
		this.reason = reason;
	}
}

/** Malformed envelope or result. Fatal for the one request it concerns. */
export class ProtocolError extends McpError {
	constructor(message: string, cause?: unknown) {
		super("PROTOCOL_ERROR", message, { cause });
		this.name = "ProtocolError";
	}
}

/** A response envelope that carried an `error` object. */
export class RpcError extends McpError {
	readonly rpcCode: number;
	readonly data?: unknown;

	constructor(rpcCode: number, message: string, data?: unknown) {
		super("RPC_ERROR", message, { retryable: isServerErrorCode(rpcCode) });
		this.name = "RpcError";
		this.rpcCode = rpcCode;
		this.data = data;
	}
}

export class ToolError extends McpError {
	readonly toolName: string;
	readonly rpcCode: number | null;

	constructor(
		toolName: string,
		message: string,
		options?: {
			rpcCode?: number | null;
			retryable?: boolean;
			cause?: unknown;
			code?: McpErrorCode;
		},
	) {
		super(options?.code ?? "TOOL_ERROR", message, {
			retryable: options?.retryable ?? false,
			cause: options?.cause,
		});
		this.name = "ToolError";
		this.toolName = toolName;
		this.rpcCode = options?.rpcCode ?? null;
	}
}

/** The remote reported the tool as unimplemented. The one error kind that
 *  selects fallback behaviour. */
export class NotImplementedError extends ToolError {
	constructor(toolName: string, message: string, cause?: unknown) {
		super(toolName, message, {
			code: "NOT_IMPLEMENTED",
			rpcCode: JSON_RPC_ERROR_CODES.INTERNAL_ERROR,
			cause,
		});
		this.name = "NotImplementedError";
	}
}

export class StepPreconditionError extends McpError {
	readonly step: string;

	constructor(step: string, message: string) {
		super("STEP_PRECONDITION", message);
		this.name = "StepPreconditionError";
		this.step = step;
	}
}

export class CompletionTimeoutError extends McpError {
	readonly timeoutMs: number;

	constructor(message: string, timeoutMs: number) {
		super("COMPLETION_TIMEOUT", message, { retryable: true });
		this.name = "CompletionTimeoutError";
		this.timeoutMs = timeoutMs;
	}
}

export function isServerErrorCode(code: number): boolean {
	return (
		code >= JSON_RPC_ERROR_CODES.SERVER_ERROR_MIN &&
		code <= JSON_RPC_ERROR_CODES.SERVER_ERROR_MAX
	);
}

export function mentionsNotImplemented(message: string): boolean {
	return message.toLowerCase().includes(NOT_IMPLEMENTED_MARKER);
}
