import { errorMessage } from "../errors";
import type { Logger } from "../logger";
import {
	CompletionTimeoutError,
	StepPreconditionError,
	ToolError,
} from "../mcp/mcp-errors";
import { awaitMove } from "../viewer/await-completion";
import {
	acquireNavigationLock,
	createPlaceholderLock,
	releaseNavigationLock,
	type LockReleaseOutcome,
	type NavigationLock,
} from "../viewer/navigation-lock";
import type { SlideInfo } from "../viewer/viewer-schemas";
import type { ViewerTools } from "../viewer/viewer-tools";
import type { ProgressReporter } from "./progress-reporter";
import { planRegion } from "./region-plan";
import {
	appendStep,
	withUpdates,
	type RunContext,
	type StepName,
} from "./run-context";

export interface WorkflowSettings {
	lockTtlSeconds: number;
	baselineSettleMs: number;
	movePollIntervalMs: number;
	moveTimeoutMs: number;
}

/** Collaborators a step may use besides the viewer tools. */
export interface StepEnvironment {
	logger: Logger;
	progress: ProgressReporter;
	settings: WorkflowSettings;
	sleep: (ms: number) => Promise<void>;
	now?: () => number;
}

export type StepHandler = (
	context: RunContext,
	tools: ViewerTools,
	env: StepEnvironment,
) => Promise<RunContext>;

export interface WorkflowStep {
	name: StepName;
	/** Used in the run's error message when the step fails. */
	label: string;
	/** Runs even after an earlier step failed. */
	alwaysRun: boolean;
	run: StepHandler;
}

export const SURVEY_ZOOM = 2;
export const SURVEY_MOVE_DURATION_MS = 500;

function requireSlideInfo(context: RunContext, step: StepName): SlideInfo {
	if (!context.slideInfo) {
		throw new StepPreconditionError(step, "Slide info not available");
	}
	return context.slideInfo;
}

export const connectStep: StepHandler = async (context, tools, env) => {
	await env.progress.log("Loading slide…");
	env.logger.info({ slidePath: context.slidePath }, "Loading slide");

	const slideInfo = await tools.loadSlide(context.slidePath);
	const viewport =
		slideInfo.viewport ?? (await tools.getSlideInfo()).viewport ?? null;

	const dimensions = `${slideInfo.width}x${slideInfo.height}`;
	env.logger.info({ dimensions, levels: slideInfo.levels }, "Slide loaded");
	await env.progress.update({ summary: `Slide loaded: ${dimensions}` });
	await env.progress.log(`Slide loaded (${dimensions}).`, "success");

	return appendStep(
		withUpdates(context, { slideInfo, viewport, status: "running" }),
		"connect",
		{ slideLoaded: true, dimensions, levels: slideInfo.levels },
	);
};

export const acquireLockStep: StepHandler = async (context, tools, env) => {
	await env.progress.log("Acquiring navigation lock…");

	const acquisition = await acquireNavigationLock(
		tools,
		context.runId,
		env.settings.lockTtlSeconds,
	);

	if (acquisition.outcome === "failed") {
		throw acquisition.error;
	}

	let lock: NavigationLock;
	if (acquisition.outcome === "granted") {
		lock = acquisition.lock;
		env.logger.info({ token: lock.token }, "Navigation lock acquired");
		await env.progress.log("Navigation lock acquired.", "success");
	} else {
		lock = createPlaceholderLock(context.runId);
		env.logger.warn(
			{ error: acquisition.error.message },
			"Navigation lock not implemented, continuing with placeholder",
		);
		await env.progress.log(
			"Navigation lock not available, continuing without it.",
			"warning",
		);
	}

	return appendStep(
		withUpdates(context, { lock, lockHeld: true }),
		"acquire_lock",
		{ token: lock.token, kind: lock.kind },
	);
};

export const resetToBaselineStep: StepHandler = async (
	context,
	tools,
	env,
) => {
	await env.progress.log("Resetting view to baseline…");

	const viewport = await tools.resetView();
	await env.sleep(env.settings.baselineSettleMs);

	let baselineSnapshotUrl: string | null = null;
	try {
		const snapshot = await tools.captureSnapshot();
		baselineSnapshotUrl = snapshot.url ?? null;
	} catch (error: unknown) {
		if (!(error instanceof ToolError)) {
			throw error;
		}
		env.logger.warn(
			{ code: error.code, error: error.message },
			"Baseline snapshot not captured",
		);
	}

	return appendStep(
		withUpdates(context, { viewport, baselineSnapshotUrl }),
		"reset_to_baseline",
		{
			viewport: { x: viewport.position.x, y: viewport.position.y, zoom: viewport.zoom },
			snapshot: baselineSnapshotUrl ?? "not_captured",
		},
	);
};

export const surveyStep: StepHandler = async (context, tools, env) => {
	const slide = requireSlideInfo(context, "survey");
	const centerX = slide.width / 2;
	const centerY = slide.height / 2;

	await env.progress.log("Surveying slide…");
	const token = await tools.moveCamera({
		centerX,
		centerY,
		zoom: SURVEY_ZOOM,
		durationMs: SURVEY_MOVE_DURATION_MS,
	});

	let moveCompleted = true;
	try {
		await awaitMove(tools, token, {
			timeoutMs: env.settings.moveTimeoutMs,
			pollIntervalMs: env.settings.movePollIntervalMs,
			sleep: env.sleep,
			now: env.now,
		});
	} catch (error: unknown) {
		if (!(error instanceof CompletionTimeoutError)) {
			throw error;
		}
		moveCompleted = false;
		env.logger.warn({ token, timeoutMs: error.timeoutMs }, "Survey move did not complete");
	}

	const refreshed = await tools.getSlideInfo();

	return appendStep(
		withUpdates(context, { viewport: refreshed.viewport ?? context.viewport }),
		"survey",
		{ center: [centerX, centerY], zoom: SURVEY_ZOOM, moveToken: token, moveCompleted },
	);
};

export const planRegionStep: StepHandler = async (context, _tools, env) => {
	const slide = requireSlideInfo(context, "plan_region");
	const plan = planRegion(slide, context.roiHint);

	env.logger.info(
		{ center: plan.center, size: plan.size, source: plan.source },
		"Region planned",
	);
	await env.progress.log(
		`ROI planned (center=(${plan.center[0]}, ${plan.center[1]}), size=${plan.size}).`,
	);

	return appendStep(
		withUpdates(context, { plannedVertices: plan.vertices }),
		"plan_region",
		{
			center: plan.center,
			size: plan.size,
			source: plan.source,
			vertexCount: plan.vertices.length,
		},
	);
};

export const annotateRegionStep: StepHandler = async (context, tools, env) => {
	if (context.plannedVertices.length === 0) {
		throw new StepPreconditionError(
			"annotate_region",
			"No planned ROI vertices available",
		);
	}

	await env.progress.log("Creating ROI annotation…");
	const annotation = await tools.createAnnotation(
		context.plannedVertices,
		`ROI-${context.runId.slice(0, 8)}`,
	);
	const metrics = await tools.computeRegionMetrics(context.plannedVertices);

	env.logger.info(
		{ annotationId: annotation.id, area: metrics.area },
		"Region annotated",
	);
	await env.progress.log(`ROI annotation ${annotation.id} created.`, "success");

	return appendStep(
		withUpdates(context, {
			annotationIds: [...context.annotationIds, annotation.id],
			regionMetrics: [...context.regionMetrics, metrics],
		}),
		"annotate_region",
		{ annotationId: annotation.id, area: metrics.area ?? null },
	);
};

export function buildSummary(context: RunContext): string {
	const lines = [
		`Analysis complete for slide: ${context.slidePath}`,
		`Task: ${context.task}`,
		"",
	];

	if (context.slideInfo) {
		const { width, height, levels } = context.slideInfo;
		lines.push(`Slide dimensions: ${width}x${height} (${levels} pyramid levels)`);
	}
	lines.push(`ROIs created: ${context.annotationIds.length}`);

	context.regionMetrics.forEach((metrics, index) => {
		const annotationId = context.annotationIds[index];
		lines.push("", `ROI ${annotationId ?? index + 1}:`);
		lines.push(`  Area: ${(metrics.area ?? 0).toFixed(2)} sq pixels`);

		const counts = Object.entries(metrics.cell_counts ?? {});
		if (counts.length > 0) {
			lines.push("  Cell counts:");
			for (const [cellType, count] of counts) {
				lines.push(`    ${cellType}: ${count}`);
			}
			const total = counts.reduce((sum, [, count]) => sum + count, 0);
			lines.push(`  Total cells: ${total}`);
		}
	});

	return lines.join("\n");
}

export const summarizeStep: StepHandler = async (context, _tools, env) => {
	await env.progress.log("Generating summary…");
	const summary = buildSummary(context);

	await env.progress.update({
		summary: `ROIs: ${context.annotationIds.length}`,
		reasoning: summary,
	});
	await env.progress.log("Summary generated.", "success");

	return appendStep(withUpdates(context, { summary }), "summarize", {
		summaryLength: summary.length,
	});
};

export const releaseStep: StepHandler = async (context, tools, env) => {
	let outcome: LockReleaseOutcome | "none" | "error" = "none";

	if (context.lockHeld && context.lock) {
		try {
			outcome = await releaseNavigationLock(tools, context.lock);
			env.logger.info({ outcome }, "Navigation lock released");
		} catch (error: unknown) {
			outcome = "error";
			env.logger.error(
				{ error: errorMessage(error) },
				"Navigation lock release failed",
			);
		}
	}

	const status = context.status === "failed" ? "failed" : "completed";
	return appendStep(
		withUpdates(context, { lockHeld: false, status }),
		"release",
		{ lockReleased: outcome },
	);
};

export const WORKFLOW_STEPS: readonly WorkflowStep[] = [
	{ name: "connect", label: "Connect", alwaysRun: false, run: connectStep },
	{
		name: "acquire_lock",
		label: "Lock acquisition",
		alwaysRun: false,
		run: acquireLockStep,
	},
	{
		name: "reset_to_baseline",
		label: "Baseline reset",
		alwaysRun: false,
		run: resetToBaselineStep,
	},
	{ name: "survey", label: "Survey", alwaysRun: false, run: surveyStep },
	{
		name: "plan_region",
		label: "Region planning",
		alwaysRun: false,
		run: planRegionStep,
	},
	{
		name: "annotate_region",
		label: "Region annotation",
		alwaysRun: false,
		run: annotateRegionStep,
	},
	{ name: "summarize", label: "Summarization", alwaysRun: false, run: summarizeStep },
	{ name: "release", label: "Release", alwaysRun: true, run: releaseStep },
];
