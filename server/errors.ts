export type AppErrorCode =
	| "INVALID_CONFIG"
	| "INVALID_REQUEST"
	| "RUN_NOT_FOUND"
	| "RUN_IN_PROGRESS";

/**
 * Application-level error with a user-facing message.
 * Raised for configuration problems and front-door request failures.
 */
export class AppError extends Error {
	public readonly code: AppErrorCode;

	constructor(code: AppErrorCode, message: string) {
		super(message);
		this.name = "AppError";
		this.code = code;
	}
}

export function toError(error: unknown): Error {
	if (error instanceof Error) {
		return error;
	}
	return new Error(String(error));
}

export function errorMessage(error: unknown): string {
	return toError(error).message;
}
