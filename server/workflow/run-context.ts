import { z } from "zod";
import type { NavigationLock } from "../viewer/navigation-lock";
import type {
	RegionMetrics,
	SlideInfo,
	Vertex,
	Viewport,
} from "../viewer/viewer-schemas";

export const STEP_NAMES = [
	"connect",
	"acquire_lock",
	"reset_to_baseline",
	"survey",
	"plan_region",
	"annotate_region",
	"summarize",
	"release",
] as const;

export type StepName = (typeof STEP_NAMES)[number];

export type RunStatus = "pending" | "running" | "completed" | "failed";

export const roiHintSchema = z.object({
	center: z.tuple([z.number(), z.number()]),
	size: z.number().positive().optional(),
});

export type RoiHint = z.infer<typeof roiHintSchema>;

export const runInputSchema = z.object({
	slidePath: z.string().min(1),
	task: z.string().min(1),
	roiHint: roiHintSchema.nullish(),
});

export type RunInput = z.infer<typeof runInputSchema>;

export interface StepLogEntry {
	readonly step: StepName;
	readonly timestamp: string;
	readonly result: Readonly<Record<string, unknown>>;
}

/**
 * Everything one run knows. Owned by the engine executing the run and
 * threaded through the steps: each step gets the current value and
 * returns the next one. Never shared between runs.
 */
export interface RunContext {
	readonly runId: string;
	readonly slidePath: string;
	readonly task: string;
	readonly roiHint: RoiHint | null;

	readonly lock: NavigationLock | null;
	readonly lockHeld: boolean;

	readonly slideInfo: SlideInfo | null;
	readonly viewport: Viewport | null;
	readonly baselineSnapshotUrl: string | null;
	readonly progressCardId: string | null;

	readonly plannedVertices: readonly Vertex[];
	readonly annotationIds: readonly number[];
	readonly regionMetrics: readonly RegionMetrics[];

	readonly stepsLog: readonly StepLogEntry[];
	readonly status: RunStatus;
	readonly currentStep: StepName | null;
	readonly errorMessage: string | null;
	readonly summary: string | null;

	readonly createdAt: string;
	readonly updatedAt: string;
}

export type RunContextPatch = Partial<
	Omit<RunContext, "runId" | "slidePath" | "task" | "roiHint" | "createdAt">
>;

export function createRunContext(runId: string, input: RunInput): RunContext {
	const now = new Date().toISOString();
	return {
		runId,
		slidePath: input.slidePath,
		task: input.task,
		roiHint: input.roiHint ?? null,
		lock: null,
		lockHeld: false,
		slideInfo: null,
		viewport: null,
		baselineSnapshotUrl: null,
		progressCardId: null,
		plannedVertices: [],
		annotationIds: [],
		regionMetrics: [],
		stepsLog: [],
		status: "pending",
		currentStep: null,
		errorMessage: null,
		summary: null,
		createdAt: now,
		updatedAt: now,
	};
}

/** Next context with `patch` applied. A failed run stays failed whatever
 *  status the patch asks for. */
export function withUpdates(
	context: RunContext,
	patch: RunContextPatch,
): RunContext {
	const status =
		context.status === "failed" ? "failed" : (patch.status ?? context.status);
	return {
		...context,
		...patch,
		status,
		updatedAt: new Date().toISOString(),
	};
}

export function appendStep(
	context: RunContext,
	step: StepName,
	result: Record<string, unknown>,
): RunContext {
	const entry: StepLogEntry = {
		step,
		timestamp: new Date().toISOString(),
		result: { ...result },
	};
	return withUpdates(context, { stepsLog: [...context.stepsLog, entry] });
}

export function markFailed(context: RunContext, message: string): RunContext {
	return withUpdates(context, { status: "failed", errorMessage: message });
}

export function isTerminal(status: RunStatus): boolean {
	return status === "completed" || status === "failed";
}
