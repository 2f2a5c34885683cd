import { NotImplementedError, ToolError } from "../mcp/mcp-errors";
import { toError } from "../errors";
import type { LockReply } from "./viewer-schemas";
import type { ViewerTools } from "./viewer-tools";

export type NavigationLockKind = "exclusive" | "placeholder";

/**
 * What the client knows about a navigation lock: an opaque token plus the
 * owner it was requested for. The server arbitrates the lock itself.
 */
export interface NavigationLock {
	kind: NavigationLockKind;
	token: string;
	owner: string;
	acquiredAt: string;
	ttlMs: number | null;
}

export type LockAcquisition =
	| { outcome: "granted"; lock: NavigationLock }
	| { outcome: "not_implemented"; error: NotImplementedError }
	| { outcome: "failed"; error: Error };

export type LockReleaseOutcome =
	| "released"
	| "not_held"
	| "placeholder"
	| "not_implemented";

const NOT_LOCKED_PATTERN = /not locked/i;

/** Ask the viewer for the navigation lock. Never throws; the outcome says
 *  which case the caller is in. */
export async function acquireNavigationLock(
	tools: ViewerTools,
	owner: string,
	ttlSeconds: number,
): Promise<LockAcquisition> {
	try {
		const reply = await tools.navLock(owner, ttlSeconds);
		if (!reply.success) {
			const holder = reply.lock_owner ? ` (held by ${reply.lock_owner})` : "";
			return {
				outcome: "failed",
				error: new ToolError(
					"nav_lock",
					`${reply.error ?? "Navigation lock refused"}${holder}`,
				),
			};
		}

		return {
			outcome: "granted",
			lock: {
				kind: "exclusive",
				token: reply.token ?? reply.lock_owner ?? owner,
				owner,
				acquiredAt: new Date().toISOString(),
				ttlMs: reply.ttl_ms ?? ttlSeconds * 1000,
			},
		};
	} catch (error: unknown) {
		if (error instanceof NotImplementedError) {
			return { outcome: "not_implemented", error };
		}
		return { outcome: "failed", error: toError(error) };
	}
}

/** Locally synthesized stand-in used when the viewer has no lock tool. */
export function createPlaceholderLock(owner: string): NavigationLock {
	return {
		kind: "placeholder",
		token: `placeholder-lock-${owner}`,
		owner,
		acquiredAt: new Date().toISOString(),
		ttlMs: null,
	};
}

/**
 * Give the lock back. A placeholder never reaches the viewer, and a viewer
 * that reports nothing locked is not an error.
 */
export async function releaseNavigationLock(
	tools: ViewerTools,
	lock: NavigationLock,
): Promise<LockReleaseOutcome> {
	if (lock.kind === "placeholder") {
		return "placeholder";
	}

	let reply: LockReply;
	try {
		reply = await tools.navUnlock(lock.owner);
	} catch (error: unknown) {
		if (error instanceof NotImplementedError) {
			return "not_implemented";
		}
		throw error;
	}

	if (reply.success) {
		return "released";
	}
	if (NOT_LOCKED_PATTERN.test(reply.error ?? "")) {
		return "not_held";
	}
	throw new ToolError("nav_unlock", reply.error ?? "Navigation unlock refused");
}
