import type { z } from "zod";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { errorMessage } from "../errors";
import type { Logger } from "../logger";
import { versionedFileSchema, type StoreConfig, type VersionedFile } from "./store-types";

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * A value persisted as one versioned JSON file. Reads validate the payload
 * with the given schema; writes go through a temp file and a rename.
 */
export class JsonStore<T> {
	private pendingData: T | null = null;
	private debounceTimer: ReturnType<typeof setTimeout> | null = null;
	private inFlight: Promise<void> = Promise.resolve();

	constructor(
		private readonly config: StoreConfig,
		private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
		private readonly defaultData: T,
		private readonly logger: Logger,
	) {}

	/** Stored data, or the default when the file is missing or unreadable. */
	async read(): Promise<T> {
		let raw: string;
		try {
			raw = await readFile(this.config.filePath, "utf-8");
		} catch (error: unknown) {
			if (!isMissingFile(error)) {
				this.logger.warn(
					{ filePath: this.config.filePath, error: errorMessage(error) },
					"Store file unreadable, starting empty",
				);
			}
			return this.defaultData;
		}

		let json: unknown;
		try {
			json = JSON.parse(raw);
		} catch (error: unknown) {
			this.logger.warn(
				{ filePath: this.config.filePath, error: errorMessage(error) },
				"Store file is not valid JSON, starting empty",
			);
			return this.defaultData;
		}

		const file = versionedFileSchema.safeParse(json);
		const data = this.schema.safeParse(file.success ? file.data.data : undefined);
		if (!file.success || !data.success) {
			this.logger.warn(
				{ filePath: this.config.filePath },
				"Store file has an unexpected shape, starting empty",
			);
			return this.defaultData;
		}
		return data.data;
	}

	/**
	 * Persist data.
	 *
	 * - When `writeDebounceMs <= 0`, writes are immediate. Tests use this.
	 * - When `writeDebounceMs > 0`, only the last write in a burst reaches
	 *   the file, `writeDebounceMs` after the burst ends.
	 */
	async write(data: T): Promise<void> {
		if (this.config.writeDebounceMs <= 0) {
			await this.writeNow(data);
			return;
		}

		this.pendingData = data;
		if (this.debounceTimer) {
			clearTimeout(this.debounceTimer);
		}
		this.debounceTimer = setTimeout(() => {
			this.flush().catch((error: unknown) => {
				this.logger.error(
					{ filePath: this.config.filePath, error: errorMessage(error) },
					"Debounced store write failed",
				);
			});
		}, this.config.writeDebounceMs);
	}

	async writeNow(data: T): Promise<void> {
		if (this.debounceTimer) {
			clearTimeout(this.debounceTimer);
			this.debounceTimer = null;
		}
		this.pendingData = null;
		await this.enqueue(data);
	}

	/** Write out any debounced data and wait for writes in progress. */
	async flush(): Promise<void> {
		if (this.debounceTimer) {
			clearTimeout(this.debounceTimer);
			this.debounceTimer = null;
		}
		if (this.pendingData !== null) {
			const data = this.pendingData;
			this.pendingData = null;
			await this.enqueue(data);
			return;
		}
		await this.inFlight;
	}

	private enqueue(data: T): Promise<void> {
		const next = this.inFlight.then(() => this.atomicWrite(data));
		this.inFlight = next.catch(() => undefined);
		return next;
	}

	private async atomicWrite(data: T): Promise<void> {
		await mkdir(dirname(this.config.filePath), { recursive: true });
		const tmpPath = `${this.config.filePath}.tmp`;
		const versioned: VersionedFile<T> = { version: 1, data };
		await writeFile(tmpPath, JSON.stringify(versioned, null, 2), "utf-8");
		await rename(tmpPath, this.config.filePath);
	}
}
