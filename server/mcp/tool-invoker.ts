import {
	JSON_RPC_ERROR_CODES,
	NotImplementedError,
	RpcError,
	ToolError,
	isServerErrorCode,
	mentionsNotImplemented,
} from "./mcp-errors";
import type { RpcChannel } from "./mcp-types";
import { isRecord } from "./mcp-types";

export interface ToolInvokerOptions {
	/** Per-call timeout; falls back to the channel's default when absent. */
	timeoutMs?: number;
}

/** Anything that can run a named remote tool. */
export interface ToolCaller {
	callTool(name: string, args?: Record<string, unknown>): Promise<unknown>;
}

/**
 * Uniform tool-call surface over a JSON-RPC channel: issues `tools/call`,
 * unwraps the result envelope and turns remote failures into ToolError /
 * NotImplementedError. Transport failures pass through untouched.
 */
export class ToolInvoker implements ToolCaller {
	constructor(
		private readonly channel: RpcChannel,
		private readonly options: ToolInvokerOptions = {},
	) {}

	async callTool(
		name: string,
		args: Record<string, unknown> = {},
	): Promise<unknown> {
		let result: unknown;
		try {
			result = await this.channel.sendRequest(
				"tools/call",
				{ name, arguments: args },
				this.options.timeoutMs,
			);
		} catch (error: unknown) {
			throw classifyToolFailure(name, error);
		}
		return unwrapToolResult(name, result);
	}
}

/** Map an RpcError raised for a tool call onto the tool error taxonomy. */
export function classifyToolFailure(toolName: string, error: unknown): unknown {
	if (!(error instanceof RpcError)) {
		return error;
	}
	if (
		error.rpcCode === JSON_RPC_ERROR_CODES.INTERNAL_ERROR &&
		mentionsNotImplemented(error.message)
	) {
		return new NotImplementedError(toolName, error.message, error);
	}
	return new ToolError(toolName, error.message, {
		rpcCode: error.rpcCode,
		retryable: isServerErrorCode(error.rpcCode),
		cause: error,
	});
}

/**
 * Unwrap a tools/call result, in priority order:
 * 1. `isError` set: raise with the content as the message, either a plain
 *    string or the first block's text.
 * 2. A structured object, in `structuredContent` or `content`: return it.
 * 3. Text blocks: parse the first as JSON (the raw text if it is not JSON).
 * Any other shape is returned as is.
 */
export function unwrapToolResult(toolName: string, result: unknown): unknown {
	if (!isRecord(result)) {
		return result;
	}

	if (result.isError === true) {
		const message =
			errorText(result.content) ?? `Tool ${toolName} reported an error`;
		if (mentionsNotImplemented(message)) {
			throw new NotImplementedError(toolName, message);
		}
		throw new ToolError(toolName, message);
	}

	if (isRecord(result.structuredContent)) {
		return result.structuredContent;
	}
	if (isRecord(result.content)) {
		return result.content;
	}

	const text = firstTextBlock(result.content);
	if (text === undefined) {
		return result;
	}
	try {
		const parsed: unknown = JSON.parse(text);
		return parsed;
	} catch {
		return text;
	}
}

function errorText(content: unknown): string | undefined {
	if (typeof content === "string") {
		return content.length > 0 ? content : undefined;
	}
	return firstTextBlock(content);
}

function firstTextBlock(content: unknown): string | undefined {
	if (!Array.isArray(content)) {
		return undefined;
	}
	const first: unknown = content[0];
	if (isRecord(first) && first.type === "text" && typeof first.text === "string") {
		return first.text;
	}
	return undefined;
}
