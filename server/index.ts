import Fastify from "fastify";
import { registerRunRoutes } from "./api/runs/routes";
import { loadConfig } from "./config";
import { createLogger } from "./logger";
import { McpSession } from "./mcp/mcp-session";
import { RunService } from "./runs/run-service";
import { InMemoryRunStore, JsonRunStore, type RunStore } from "./runs/run-store";
import { APP_VERSION } from "./version";

const RUNS_WRITE_DEBOUNCE_MS = 250;

async function main() {
	const config = loadConfig();
	const logger = createLogger(config.logLevel);
	const app = Fastify({ logger: { level: config.logLevel } });

	const store: RunStore = config.runsFile
		? await JsonRunStore.open(
				{ filePath: config.runsFile, writeDebounceMs: RUNS_WRITE_DEBOUNCE_MS },
				logger,
			)
		: new InMemoryRunStore();

	const runService = new RunService({
		store,
		logger,
		settings: {
			lockTtlSeconds: config.lockTtlSeconds,
			baselineSettleMs: config.baselineSettleMs,
			movePollIntervalMs: config.movePollIntervalMs,
			moveTimeoutMs: config.moveTimeoutMs,
		},
		createConnection: (_runId, runLogger) =>
			new McpSession({
				sseUrl: config.viewerSseUrl,
				requestTimeoutMs: config.requestTimeoutMs,
				endpointTimeoutMs: config.endpointTimeoutMs,
				logger: runLogger,
			}),
	});

	await registerRunRoutes(app, { runService, version: APP_VERSION });

	await app.listen({ port: config.port, host: config.host });
	logger.info(
		{ port: config.port, viewer: config.viewerSseUrl },
		"Analysis service listening",
	);

	let shuttingDown = false;
	const shutdown = async (signal: string) => {
		if (shuttingDown) {
			return;
		}
		shuttingDown = true;
		logger.info({ signal, activeRuns: runService.activeCount }, "Shutting down");
		try {
			await app.close();
			await runService.drain();
			process.exit(0);
		} catch (error) {
			logger.error({ err: error }, "Shutdown failed");
			process.exit(1);
		}
	};

	process.on("SIGINT", () => {
		void shutdown("SIGINT");
	});
	process.on("SIGTERM", () => {
		void shutdown("SIGTERM");
	});
}

main().catch((err) => {
	console.error("Failed to start server:", err);
	process.exit(1);
});
