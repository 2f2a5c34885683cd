import { CompletionTimeoutError } from "../mcp/mcp-errors";
import type { MoveStatus } from "./viewer-schemas";
import type { ViewerTools } from "./viewer-tools";

export interface AwaitCompletionOptions {
	/** Hard deadline, measured from the first poll. */
	timeoutMs: number;
	/** Fixed pause between polls. */
	pollIntervalMs: number;
	now?: () => number;
	sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
	return new Promise<void>((resolve) => {
		setTimeout(resolve, ms);
	});
}

/**
 * Poll a status-by-token check until it reports completion or the deadline
 * passes. The viewer has no push signal for completion, so polling is the
 * contract. After the deadline exactly one more check runs, so completion
 * that lands between the last scheduled poll and the deadline still counts.
 */
export async function awaitCompletion<T extends { completed: boolean }>(
	poll: () => Promise<T>,
	options: AwaitCompletionOptions,
): Promise<T> {
	const now = options.now ?? Date.now;
	const pause = options.sleep ?? sleep;
	const deadline = now() + options.timeoutMs;

	while (now() < deadline) {
		const status = await poll();
		if (status.completed) {
			return status;
		}
		await pause(options.pollIntervalMs);
	}

	const finalStatus = await poll();
	if (finalStatus.completed) {
		return finalStatus;
	}
	throw new CompletionTimeoutError(
		`Operation did not complete within ${options.timeoutMs}ms`,
		options.timeoutMs,
	);
}

/** Wait for an animated camera move started with `move_camera`. */
export async function awaitMove(
	tools: ViewerTools,
	token: string,
	options: AwaitCompletionOptions,
): Promise<MoveStatus> {
	return awaitCompletion(() => tools.awaitMoveStatus(token), options);
}
