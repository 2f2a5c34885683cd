import type { FastifyInstance } from "fastify";
import { AppError, type AppErrorCode } from "../../errors";
import type { RunService } from "../../runs/run-service";
import { isTerminal, runInputSchema } from "../../workflow/run-context";

/** The part of the run service the HTTP routes use. */
export type RunsApi = Pick<
	RunService,
	"startRun" | "getRun" | "getRunStatus" | "listRuns"
>;

export interface RunRoutesDeps {
	runService: RunsApi;
	version: string;
}

const HTTP_STATUS: Record<AppErrorCode, number> = {
	INVALID_CONFIG: 500,
	INVALID_REQUEST: 400,
	RUN_NOT_FOUND: 404,
	RUN_IN_PROGRESS: 409,
};

type RunParams = { Params: { id: string } };

export async function registerRunRoutes(
	app: FastifyInstance,
	deps: RunRoutesDeps,
): Promise<void> {
	const { runService } = deps;

	app.setErrorHandler(async (error, _request, reply) => {
		if (error instanceof AppError) {
			return reply
				.status(HTTP_STATUS[error.code])
				.send({ code: error.code, message: error.message });
		}
		return reply.send(error);
	});

	app.get("/health", async () => ({ status: "ok", version: deps.version }));

	app.post("/api/analyze", async (request, reply) => {
		const parsed = runInputSchema.safeParse(request.body);
		if (!parsed.success) {
			const detail = parsed.error.issues
				.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
				.join("; ");
			throw new AppError("INVALID_REQUEST", `Invalid analyze request: ${detail}`);
		}

		const run = await runService.startRun(parsed.data);
		return reply.status(202).send({ runId: run.runId, status: run.status });
	});

	app.get("/api/runs", async () => ({ runs: runService.listRuns() }));

	app.get<RunParams>("/api/runs/:id", async (request) => {
		const status = runService.getRunStatus(request.params.id);
		if (!status) {
			throw new AppError("RUN_NOT_FOUND", `Run not found: ${request.params.id}`);
		}
		return status;
	});

	app.get<RunParams>("/api/runs/:id/details", async (request) => {
		const run = runService.getRun(request.params.id);
		if (!run) {
			throw new AppError("RUN_NOT_FOUND", `Run not found: ${request.params.id}`);
		}
		if (!isTerminal(run.status)) {
			throw new AppError(
				"RUN_IN_PROGRESS",
				`Run ${run.runId} is still ${run.status}`,
			);
		}
		return run;
	});
}
