import { errorMessage } from "../errors";
import { releaseNavigationLock } from "../viewer/navigation-lock";
import type { ViewerTools } from "../viewer/viewer-tools";
import {
	appendStep,
	markFailed,
	withUpdates,
	type RunContext,
} from "./run-context";
import {
	WORKFLOW_STEPS,
	type StepEnvironment,
	type WorkflowStep,
} from "./steps";

export interface WorkflowOptions {
	steps?: readonly WorkflowStep[];
	/** Called with the context produced by every step, in order. */
	onContext?: (context: RunContext) => void | Promise<void>;
}

async function executeStep(
	step: WorkflowStep,
	context: RunContext,
	tools: ViewerTools,
	env: StepEnvironment,
): Promise<RunContext> {
	const current = withUpdates(context, { currentStep: step.name });
	const logger = env.logger.child({ step: step.name });

	if (current.status === "failed" && !step.alwaysRun) {
		logger.debug("Skipping step after earlier failure");
		return appendStep(current, step.name, {
			skipped: true,
			reason: "run already failed",
		});
	}

	try {
		return await step.run(current, tools, { ...env, logger });
	} catch (error: unknown) {
		const message = `${step.label} failed: ${errorMessage(error)}`;
		logger.error({ error: errorMessage(error) }, "Workflow step failed");
		await env.progress.log(message, "error");
		return appendStep(markFailed(current, message), step.name, {
			error: message,
		});
	}
}

/**
 * Run the steps in order, threading the context through them. A failing
 * step marks the run failed; later steps are then only logged as skipped,
 * except the ones that always run (the lock release).
 */
export async function runWorkflow(
	initial: RunContext,
	tools: ViewerTools,
	env: StepEnvironment,
	options: WorkflowOptions = {},
): Promise<RunContext> {
	const steps = options.steps ?? WORKFLOW_STEPS;
	let context =
		initial.status === "pending"
			? withUpdates(initial, { status: "running" })
			: initial;

	for (const step of steps) {
		context = await executeStep(step, context, tools, env);
		await options.onContext?.(context);
	}
	return context;
}

/**
 * `runWorkflow` plus guaranteed cleanup. An error escaping the engine fails
 * the run from the last context it reported. Whatever happened, a lock
 * still marked held is released afterwards; trouble releasing it is logged
 * and never changes the run's status.
 */
export async function runWithCleanup(
	initial: RunContext,
	tools: ViewerTools,
	env: StepEnvironment,
	options: WorkflowOptions = {},
): Promise<RunContext> {
	let latest = initial;
	let final: RunContext;

	try {
		final = await runWorkflow(initial, tools, env, {
			...options,
			onContext: async (context) => {
				latest = context;
				await options.onContext?.(context);
			},
		});
	} catch (error: unknown) {
		const message = `Workflow execution failed: ${errorMessage(error)}`;
		env.logger.error({ error: errorMessage(error) }, "Workflow execution failed");
		await env.progress.log(message, "error");
		final = markFailed(latest, message);
	}

	if (final.lockHeld && final.lock) {
		try {
			const outcome = await releaseNavigationLock(tools, final.lock);
			env.logger.info({ outcome }, "Navigation lock released during cleanup");
			final = withUpdates(final, { lockHeld: false });
		} catch (error: unknown) {
			env.logger.error(
				{ error: errorMessage(error) },
				"Navigation lock release failed during cleanup",
			);
		}
	}

	return final;
}
