import { z } from "zod";
import type { Logger } from "../logger";
import { JsonStore } from "../store/json-store";
import type { StoreConfig } from "../store/store-types";
import {
	regionMetricsSchema,
	slideInfoSchema,
	viewportSchema,
} from "../viewer/viewer-schemas";
import {
	STEP_NAMES,
	roiHintSchema,
	type RunContext,
} from "../workflow/run-context";

/** Where run contexts live between and after executions. */
export interface RunStore {
	get(runId: string): RunContext | undefined;
	put(context: RunContext): Promise<void>;
	/** Oldest first. */
	list(): RunContext[];
	/** Wait until everything put so far is persisted. */
	flush(): Promise<void>;
}

export class InMemoryRunStore implements RunStore {
	private readonly runs = new Map<string, RunContext>();

	get(runId: string): RunContext | undefined {
		return this.runs.get(runId);
	}

	async put(context: RunContext): Promise<void> {
		this.runs.set(context.runId, context);
	}

	list(): RunContext[] {
		return [...this.runs.values()];
	}

	async flush(): Promise<void> {}
}

const navigationLockSchema = z.object({
	kind: z.enum(["exclusive", "placeholder"]),
	token: z.string(),
	owner: z.string(),
	acquiredAt: z.string(),
	ttlMs: z.number().nullable(),
});

export const runContextSchema = z.object({
	runId: z.string(),
	slidePath: z.string(),
	task: z.string(),
	roiHint: roiHintSchema.nullable(),
	lock: navigationLockSchema.nullable(),
	lockHeld: z.boolean(),
	slideInfo: slideInfoSchema.nullable(),
	viewport: viewportSchema.nullable(),
	baselineSnapshotUrl: z.string().nullable(),
	progressCardId: z.string().nullable(),
	plannedVertices: z.array(z.tuple([z.number(), z.number()])),
	annotationIds: z.array(z.number().int()),
	regionMetrics: z.array(regionMetricsSchema),
	stepsLog: z.array(
		z.object({
			step: z.enum(STEP_NAMES),
			timestamp: z.string(),
			result: z.record(z.unknown()),
		}),
	),
	status: z.enum(["pending", "running", "completed", "failed"]),
	currentStep: z.enum(STEP_NAMES).nullable(),
	errorMessage: z.string().nullable(),
	summary: z.string().nullable(),
	createdAt: z.string(),
	updatedAt: z.string(),
});

const runArchiveSchema = z.array(runContextSchema);

/**
 * Runs kept in memory and archived to a JSON file. The file is loaded once
 * by `open`; every `put` rewrites it (debounced when configured).
 */
export class JsonRunStore implements RunStore {
	private readonly runs = new Map<string, RunContext>();

	private constructor(private readonly store: JsonStore<RunContext[]>) {}

	static async open(config: StoreConfig, logger: Logger): Promise<JsonRunStore> {
		const store = new JsonStore<RunContext[]>(
			config,
			runArchiveSchema,
			[],
			logger.child({ component: "run-store" }),
		);
		const runStore = new JsonRunStore(store);
		for (const run of await store.read()) {
			runStore.runs.set(run.runId, run);
		}
		return runStore;
	}

	get(runId: string): RunContext | undefined {
		return this.runs.get(runId);
	}

	async put(context: RunContext): Promise<void> {
		this.runs.set(context.runId, context);
		await this.store.write(this.list());
	}

	list(): RunContext[] {
		return [...this.runs.values()];
	}

	async flush(): Promise<void> {
		await this.store.flush();
	}
}
