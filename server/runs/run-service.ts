import { randomUUID } from "node:crypto";
import { basename } from "node:path";
import { errorMessage } from "../errors";
import type { Logger } from "../logger";
import type { McpInitializeResult, RpcChannel } from "../mcp/mcp-types";
import { ToolInvoker } from "../mcp/tool-invoker";
import { sleep } from "../viewer/await-completion";
import { ViewerTools } from "../viewer/viewer-tools";
import { ProgressReporter } from "../workflow/progress-reporter";
import {
	createRunContext,
	markFailed,
	withUpdates,
	type RunContext,
	type RunInput,
	type RunStatus,
} from "../workflow/run-context";
import type { WorkflowSettings } from "../workflow/steps";
import { runWithCleanup } from "../workflow/workflow-engine";
import type { RunStore } from "./run-store";

/** A connection to the viewer's tool server, as the service drives it. */
export interface ViewerConnection extends RpcChannel {
	connect(): Promise<void>;
	initialize(): Promise<McpInitializeResult>;
	close(): Promise<void>;
}

export type ViewerConnectionFactory = (
	runId: string,
	logger: Logger,
) => ViewerConnection;

export interface RunServiceDeps {
	store: RunStore;
	createConnection: ViewerConnectionFactory;
	settings: WorkflowSettings;
	logger: Logger;
	/** Per tool call; the session's own request timeout applies when unset. */
	toolTimeoutMs?: number;
	createRunId?: () => string;
	sleep?: (ms: number) => Promise<void>;
	now?: () => number;
}

export interface RunStatusView {
	runId: string;
	status: RunStatus;
	message: string;
}

export function describeRun(context: RunContext): string {
	switch (context.status) {
		case "pending":
			return "Queued";
		case "running":
			return context.currentStep
				? `Running step: ${context.currentStep}`
				: "Connecting to viewer";
		case "completed":
			return context.summary ?? "Complete";
		case "failed":
			return context.errorMessage ?? "Failed";
	}
}

export function toStatusView(context: RunContext): RunStatusView {
	return {
		runId: context.runId,
		status: context.status,
		message: describeRun(context),
	};
}

/**
 * Starts analysis runs and tracks them to completion. Each run gets its own
 * viewer connection, executes in the background, and is persisted to the
 * store after every step.
 */
export class RunService {
	private readonly active = new Map<string, Promise<RunContext>>();
	private readonly logger: Logger;

	constructor(private readonly deps: RunServiceDeps) {
		this.logger = deps.logger.child({ component: "run-service" });
	}

	/** Record a pending run and start executing it. Resolves once the run is
	 *  stored, not when it finishes. */
	async startRun(input: RunInput): Promise<RunContext> {
		const runId = this.deps.createRunId?.() ?? randomUUID();
		const context = createRunContext(runId, input);
		await this.persist(context);

		const execution = this.execute(context).finally(() => {
			this.active.delete(runId);
		});
		this.active.set(runId, execution);
		this.logger.info({ runId, slidePath: input.slidePath }, "Run started");
		return context;
	}

	getRun(runId: string): RunContext | undefined {
		return this.deps.store.get(runId);
	}

	getRunStatus(runId: string): RunStatusView | undefined {
		const context = this.getRun(runId);
		return context ? toStatusView(context) : undefined;
	}

	listRuns(): RunStatusView[] {
		return this.deps.store.list().map(toStatusView);
	}

	/** The run's final context, waiting for it when still executing. */
	async waitForRun(runId: string): Promise<RunContext | undefined> {
		return this.active.get(runId) ?? this.getRun(runId);
	}

	/** Wait for every executing run and for the store to settle. */
	async drain(): Promise<void> {
		await Promise.all(this.active.values());
		await this.deps.store.flush();
	}

	get activeCount(): number {
		return this.active.size;
	}

	private async execute(initial: RunContext): Promise<RunContext> {
		const logger = this.logger.child({ runId: initial.runId });
		let current = withUpdates(initial, { status: "running" });
		await this.persist(current);

		let connection: ViewerConnection | null = null;
		try {
			connection = this.deps.createConnection(initial.runId, logger);
			await connection.connect();
			await connection.initialize();

			const tools = new ViewerTools(
				new ToolInvoker(connection, { timeoutMs: this.deps.toolTimeoutMs }),
			);
			const progress = await ProgressReporter.open(
				tools,
				{
					title: `Analysis: ${initial.task}`,
					summary: `Slide: ${basename(initial.slidePath)}`,
					reasoning: `Run ID: ${initial.runId}\nTask: ${initial.task}`,
					ownerUuid: initial.runId,
				},
				logger,
			);
			current = withUpdates(current, { progressCardId: progress.cardId });
			await this.persist(current);

			current = await runWithCleanup(
				current,
				tools,
				{
					logger,
					progress,
					settings: this.deps.settings,
					sleep: this.deps.sleep ?? sleep,
					now: this.deps.now,
				},
				{ onContext: (context) => this.persist(context) },
			);
			await this.finalizeProgress(progress, current);
		} catch (error: unknown) {
			logger.error({ error: errorMessage(error) }, "Run failed");
			current = markFailed(current, errorMessage(error));
		} finally {
			if (connection) {
				try {
					await connection.close();
				} catch (error: unknown) {
					logger.error(
						{ error: errorMessage(error) },
						"Failed to close viewer connection",
					);
				}
			}
		}

		await this.persist(current);
		logger.info(
			{ status: current.status, steps: current.stepsLog.length },
			"Run finished",
		);
		return current;
	}

	private async finalizeProgress(
		progress: ProgressReporter,
		context: RunContext,
	): Promise<void> {
		const failed = context.status === "failed";
		const message = describeRun(context);
		await progress.update({
			status: failed ? "failed" : "completed",
			summary: message.slice(0, 200),
			reasoning: context.summary ?? context.errorMessage ?? undefined,
		});
		await progress.log(message, failed ? "error" : "success");
	}

	private async persist(context: RunContext): Promise<void> {
		try {
			await this.deps.store.put(context);
		} catch (error: unknown) {
			this.logger.error(
				{ runId: context.runId, error: errorMessage(error) },
				"Failed to persist run",
			);
		}
	}
}
