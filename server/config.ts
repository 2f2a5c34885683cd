import { z } from "zod";
import { AppError } from "./errors";

const positiveInt = (fallback: number) =>
	z.coerce.number().int().positive().default(fallback);

export const configSchema = z.object({
	PORT: z.coerce.number().int().min(0).max(65_535).default(3000),
	HOST: z.string().min(1).default("0.0.0.0"),
	LOG_LEVEL: z
		.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
		.default("info"),
	VIEWER_SSE_URL: z.string().url().default("http://127.0.0.1:9000/sse"),
	REQUEST_TIMEOUT_MS: positiveInt(30_000),
	ENDPOINT_TIMEOUT_MS: positiveInt(10_000),
	MOVE_POLL_INTERVAL_MS: positiveInt(50),
	MOVE_TIMEOUT_MS: positiveInt(5_000),
	LOCK_TTL_SECONDS: positiveInt(300),
	BASELINE_SETTLE_MS: z.coerce.number().int().min(0).default(500),
	RUNS_FILE: z.string().min(1).optional(),
});

export interface AppConfig {
	port: number;
	host: string;
	logLevel: z.infer<typeof configSchema>["LOG_LEVEL"];
	viewerSseUrl: string;
	requestTimeoutMs: number;
	endpointTimeoutMs: number;
	movePollIntervalMs: number;
	moveTimeoutMs: number;
	lockTtlSeconds: number;
	baselineSettleMs: number;
	runsFile: string | null;
}

/** Read configuration from environment variables. Empty strings count as unset. */
export function loadConfig(
	env: Record<string, string | undefined> = process.env,
): AppConfig {
	const present = Object.fromEntries(
		Object.entries(env).filter(
			([, value]) => value !== undefined && value.trim().length > 0,
		),
	);
	const parsed = configSchema.safeParse(present);
	if (!parsed.success) {
		const fields = parsed.error.issues
			.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
			.join("; ");
		throw new AppError("INVALID_CONFIG", `Invalid configuration: ${fields}`);
	}

	const values = parsed.data;
	return {
		port: values.PORT,
		host: values.HOST,
		logLevel: values.LOG_LEVEL,
		viewerSseUrl: values.VIEWER_SSE_URL,
		requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
		endpointTimeoutMs: values.ENDPOINT_TIMEOUT_MS,
		movePollIntervalMs: values.MOVE_POLL_INTERVAL_MS,
		moveTimeoutMs: values.MOVE_TIMEOUT_MS,
		lockTtlSeconds: values.LOCK_TTL_SECONDS,
		baselineSettleMs: values.BASELINE_SETTLE_MS,
		runsFile: values.RUNS_FILE ?? null,
	};
}
