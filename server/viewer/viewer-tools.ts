import type { z } from "zod";
import { ProtocolError } from "../mcp/mcp-errors";
import type { ToolCaller } from "../mcp/tool-invoker";
import {
	agentHelloSchema,
	annotationListSchema,
	annotationSchema,
	deleteReplySchema,
	genericReplySchema,
	lockReplySchema,
	lockStatusSchema,
	moveStatusSchema,
	moveTokenSchema,
	polygonLoadSchema,
	progressCardListSchema,
	progressCardSchema,
	regionMetricsSchema,
	slideInfoSchema,
	snapshotSchema,
	viewportSchema,
	type Annotation,
	type GenericReply,
	type LockReply,
	type LockStatus,
	type MoveStatus,
	type ProgressCard,
	type ProgressCardStatus,
	type ProgressLogLevel,
	type RegionMetrics,
	type SlideInfo,
	type Snapshot,
	type Vertex,
	type Viewport,
} from "./viewer-schemas";

export interface CameraMove {
	centerX: number;
	centerY: number;
	zoom: number;
	durationMs?: number;
}

export interface ProgressCardPatch {
	status?: ProgressCardStatus;
	summary?: string;
	reasoning?: string;
}

/**
 * Typed wrappers for the viewer's tool server. Each method marshals its
 * arguments to the wire names and validates the reply.
 */
export class ViewerTools {
	constructor(private readonly caller: ToolCaller) {}

	// -- Slide & viewport --

	async loadSlide(path: string): Promise<SlideInfo> {
		return this.call("load_slide", { path }, slideInfoSchema);
	}

	async getSlideInfo(): Promise<SlideInfo> {
		return this.call("get_slide_info", {}, slideInfoSchema);
	}

	async pan(dx: number, dy: number): Promise<Viewport> {
		return this.call("pan", { dx, dy }, viewportSchema);
	}

	async zoom(delta: number): Promise<Viewport> {
		return this.call("zoom", { delta }, viewportSchema);
	}

	async zoomAtPoint(
		screenX: number,
		screenY: number,
		delta: number,
	): Promise<Viewport> {
		return this.call(
			"zoom_at_point",
			{ screen_x: screenX, screen_y: screenY, delta },
			viewportSchema,
		);
	}

	async centerOn(x: number, y: number): Promise<Viewport> {
		return this.call("center_on", { x, y }, viewportSchema);
	}

	async resetView(): Promise<Viewport> {
		return this.call("reset_view", {}, viewportSchema);
	}

	/** Start an animated move. Returns the token to poll with `awaitMoveStatus`. */
	async moveCamera(move: CameraMove): Promise<string> {
		const reply = await this.call(
			"move_camera",
			{
				center_x: move.centerX,
				center_y: move.centerY,
				zoom: move.zoom,
				duration_ms: move.durationMs ?? 300,
			},
			moveTokenSchema,
		);
		return reply.token;
	}

	/** One status check for an animated move. */
	async awaitMoveStatus(token: string): Promise<MoveStatus> {
		return this.call("await_move", { token }, moveStatusSchema);
	}

	async captureSnapshot(size?: {
		width?: number;
		height?: number;
	}): Promise<Snapshot> {
		return this.call(
			"capture_snapshot",
			{
				...(size?.width !== undefined ? { width: size.width } : {}),
				...(size?.height !== undefined ? { height: size.height } : {}),
			},
			snapshotSchema,
		);
	}

	// -- Navigation lock --

	async navLock(owner: string, ttlSeconds: number): Promise<LockReply> {
		return this.call(
			"nav_lock",
			{ owner_uuid: owner, ttl_seconds: ttlSeconds },
			lockReplySchema,
		);
	}

	async navUnlock(owner: string): Promise<LockReply> {
		return this.call("nav_unlock", { owner_uuid: owner }, lockReplySchema);
	}

	async navLockStatus(): Promise<LockStatus> {
		return this.call("nav_lock_status", {}, lockStatusSchema);
	}

	async agentHello(agentName: string, agentVersion?: string) {
		return this.call(
			"agent_hello",
			{
				agent_name: agentName,
				...(agentVersion !== undefined ? { agent_version: agentVersion } : {}),
			},
			agentHelloSchema,
		);
	}

	// -- Annotations --

	async createAnnotation(
		vertices: readonly Vertex[],
		name?: string,
	): Promise<Annotation> {
		return this.call(
			"create_annotation",
			{
				vertices: vertices.map(([x, y]) => [x, y]),
				...(name !== undefined ? { name } : {}),
			},
			annotationSchema,
		);
	}

	async listAnnotations(includeMetrics = false): Promise<Annotation[]> {
		const reply = await this.call(
			"list_annotations",
			{ include_metrics: includeMetrics },
			annotationListSchema,
		);
		return reply.annotations;
	}

	async getAnnotation(id: number): Promise<Annotation> {
		return this.call("get_annotation", { id }, annotationSchema);
	}

	async deleteAnnotation(id: number): Promise<boolean> {
		const reply = await this.call("delete_annotation", { id }, deleteReplySchema);
		return reply.success ?? false;
	}

	/** Metrics for an arbitrary polygon without creating an annotation. */
	async computeRegionMetrics(
		vertices: readonly Vertex[],
	): Promise<RegionMetrics> {
		return this.call(
			"compute_roi_metrics",
			{ vertices: vertices.map(([x, y]) => [x, y]) },
			regionMetricsSchema,
		);
	}

	// -- Polygon overlay --

	async loadPolygons(path: string) {
		return this.call("load_polygons", { path }, polygonLoadSchema);
	}

	async queryPolygons(region: {
		x: number;
		y: number;
		w: number;
		h: number;
	}): Promise<GenericReply> {
		return this.call("query_polygons", { ...region }, genericReplySchema);
	}

	async setPolygonVisibility(visible: boolean): Promise<GenericReply> {
		return this.call("set_polygon_visibility", { visible }, genericReplySchema);
	}

	// -- Progress cards --

	async createProgressCard(card: {
		title: string;
		summary?: string;
		reasoning?: string;
		ownerUuid?: string;
	}): Promise<ProgressCard> {
		return this.call(
			"create_action_card",
			{
				title: card.title,
				...(card.summary !== undefined ? { summary: card.summary } : {}),
				...(card.reasoning !== undefined ? { reasoning: card.reasoning } : {}),
				...(card.ownerUuid !== undefined ? { owner_uuid: card.ownerUuid } : {}),
			},
			progressCardSchema,
		);
	}

	async updateProgressCard(
		cardId: string,
		patch: ProgressCardPatch,
	): Promise<GenericReply> {
		return this.call(
			"update_action_card",
			{
				id: cardId,
				...(patch.status !== undefined ? { status: patch.status } : {}),
				...(patch.summary !== undefined ? { summary: patch.summary } : {}),
				...(patch.reasoning !== undefined ? { reasoning: patch.reasoning } : {}),
			},
			genericReplySchema,
		);
	}

	async appendProgressLog(
		cardId: string,
		message: string,
		level: ProgressLogLevel = "info",
	): Promise<GenericReply> {
		return this.call(
			"append_action_card_log",
			{ id: cardId, message, level },
			genericReplySchema,
		);
	}

	async listProgressCards(): Promise<ProgressCard[]> {
		const reply = await this.call("list_action_cards", {}, progressCardListSchema);
		return reply.cards;
	}

	async deleteProgressCard(cardId: string): Promise<boolean> {
		const reply = await this.call(
			"delete_action_card",
			{ id: cardId },
			deleteReplySchema,
		);
		return reply.success ?? false;
	}

	private async call<S extends z.ZodTypeAny>(
		name: string,
		args: Record<string, unknown>,
		schema: S,
	): Promise<z.output<S>> {
		const raw = await this.caller.callTool(name, args);
		const parsed = schema.safeParse(raw);
		if (!parsed.success) {
			throw new ProtocolError(
				`Unexpected ${name} result: ${parsed.error.message}`,
				parsed.error,
			);
		}
		return parsed.data;
	}
}
