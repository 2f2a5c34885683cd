import { errorMessage } from "../errors";
import type { Logger } from "../logger";
import type { ProgressLogLevel } from "../viewer/viewer-schemas";
import type { ProgressCardPatch, ViewerTools } from "../viewer/viewer-tools";

export interface ProgressCardSeed {
	title: string;
	summary?: string;
	reasoning?: string;
	ownerUuid?: string;
}

/**
 * Mirrors run progress onto a progress card in the viewer. Best effort:
 * every failure is logged at debug level and dropped, and a reporter
 * without a card does nothing.
 */
export class ProgressReporter {
	private constructor(
		private readonly tools: ViewerTools | null,
		readonly cardId: string | null,
		private readonly logger: Logger,
	) {}

	static disabled(logger: Logger): ProgressReporter {
		return new ProgressReporter(null, null, logger);
	}

	static attach(
		tools: ViewerTools,
		cardId: string | null,
		logger: Logger,
	): ProgressReporter {
		return new ProgressReporter(tools, cardId, logger);
	}

	/** Create a card and mark it in progress. Falls back to a disabled
	 *  reporter when the viewer cannot create one. */
	static async open(
		tools: ViewerTools,
		seed: ProgressCardSeed,
		logger: Logger,
	): Promise<ProgressReporter> {
		let cardId: string;
		try {
			const card = await tools.createProgressCard(seed);
			cardId = card.id;
		} catch (error: unknown) {
			logger.info(
				{ error: errorMessage(error) },
				"Progress card streaming not available",
			);
			return ProgressReporter.disabled(logger);
		}

		const reporter = new ProgressReporter(tools, cardId, logger);
		await reporter.update({ status: "in_progress" });
		await reporter.log("Analysis started");
		return reporter;
	}

	get enabled(): boolean {
		return this.tools !== null && this.cardId !== null;
	}

	async log(message: string, level: ProgressLogLevel = "info"): Promise<void> {
		if (!this.tools || !this.cardId) {
			return;
		}
		try {
			await this.tools.appendProgressLog(this.cardId, message, level);
		} catch (error: unknown) {
			this.logger.debug(
				{ cardId: this.cardId, error: errorMessage(error) },
				"Progress log append failed",
			);
		}
	}

	async update(patch: ProgressCardPatch): Promise<void> {
		if (!this.tools || !this.cardId) {
			return;
		}
		try {
			await this.tools.updateProgressCard(this.cardId, patch);
		} catch (error: unknown) {
			this.logger.debug(
				{ cardId: this.cardId, error: errorMessage(error) },
				"Progress card update failed",
			);
		}
	}
}
