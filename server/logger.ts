import { pino, type Logger, type LevelWithSilent } from "pino";
import { APP_NAME } from "./version";

export type { Logger } from "pino";

export function createLogger(level: LevelWithSilent): Logger {
	return pino({ name: APP_NAME, level });
}

/** Logger for tests and callers that do not care about output. */
export function createSilentLogger(): Logger {
	return pino({ level: "silent" });
}
