import { z } from "zod";

// Results keep keys we do not model so nothing the viewer sends is lost.

export const pointSchema = z.object({ x: z.number(), y: z.number() });

export const viewportSchema = z
	.object({
		position: pointSchema,
		zoom: z.number(),
		width: z.number().optional(),
		height: z.number().optional(),
	})
	.passthrough();

export type Viewport = z.infer<typeof viewportSchema>;

export const slideInfoSchema = z
	.object({
		path: z.string().optional(),
		width: z.number(),
		height: z.number(),
		levels: z.number().int(),
		vendor: z.string().optional(),
		viewport: viewportSchema.optional(),
	})
	.passthrough();

export type SlideInfo = z.infer<typeof slideInfoSchema>;

export const moveTokenSchema = z.object({ token: z.string().min(1) }).passthrough();

export const moveStatusSchema = z
	.object({
		completed: z.boolean(),
		aborted: z.boolean().optional(),
		position: pointSchema.optional(),
		zoom: z.number().optional(),
	})
	.passthrough();

export type MoveStatus = z.infer<typeof moveStatusSchema>;

export const lockReplySchema = z
	.object({
		success: z.boolean(),
		error: z.string().optional(),
		message: z.string().optional(),
		token: z.string().optional(),
		lock_owner: z.string().optional(),
		granted_at: z.number().optional(),
		ttl_ms: z.number().optional(),
		time_remaining_ms: z.number().optional(),
	})
	.passthrough();

export type LockReply = z.infer<typeof lockReplySchema>;

export const lockStatusSchema = z
	.object({
		locked: z.boolean(),
		owner_uuid: z.string().optional(),
		time_remaining_ms: z.number().optional(),
		granted_at: z.number().optional(),
	})
	.passthrough();

export type LockStatus = z.infer<typeof lockStatusSchema>;

export const cellCountsSchema = z.record(z.number());

export type CellCounts = z.infer<typeof cellCountsSchema>;

export const boundingBoxSchema = z.object({
	x: z.number(),
	y: z.number(),
	width: z.number(),
	height: z.number(),
});

export const annotationSchema = z
	.object({
		id: z.number().int(),
		name: z.string().optional(),
		vertex_count: z.number().int().optional(),
		vertices: z.array(z.tuple([z.number(), z.number()])).optional(),
		bounding_box: boundingBoxSchema.optional(),
		area: z.number().optional(),
		cell_counts: cellCountsSchema.optional(),
	})
	.passthrough();

export type Annotation = z.infer<typeof annotationSchema>;

export const annotationListSchema = z
	.object({ annotations: z.array(annotationSchema) })
	.passthrough();

export const deleteReplySchema = z
	.object({ success: z.boolean().optional() })
	.passthrough();

export const regionMetricsSchema = z
	.object({
		bounding_box: boundingBoxSchema.optional(),
		area: z.number().optional(),
		perimeter: z.number().optional(),
		cell_counts: cellCountsSchema.optional(),
	})
	.passthrough();

export type RegionMetrics = z.infer<typeof regionMetricsSchema>;

export const snapshotSchema = z
	.object({
		id: z.string().optional(),
		url: z.string().optional(),
		width: z.number().optional(),
		height: z.number().optional(),
	})
	.passthrough();

export type Snapshot = z.infer<typeof snapshotSchema>;

export const polygonLoadSchema = z
	.object({
		polygon_count: z.number().optional(),
		class_count: z.number().optional(),
	})
	.passthrough();

export const genericReplySchema = z.record(z.unknown());

export type GenericReply = z.infer<typeof genericReplySchema>;

export const agentHelloSchema = z
	.object({
		session_id: z.string().optional(),
		agent_name: z.string().optional(),
	})
	.passthrough();

export const progressCardStatusSchema = z.enum([
	"pending",
	"in_progress",
	"completed",
	"failed",
	"cancelled",
]);

export type ProgressCardStatus = z.infer<typeof progressCardStatusSchema>;

export const progressLogLevelSchema = z.enum([
	"info",
	"warning",
	"error",
	"success",
]);

export type ProgressLogLevel = z.infer<typeof progressLogLevelSchema>;

export const progressCardSchema = z
	.object({
		id: z.union([z.string(), z.number()]).transform(String),
		title: z.string().optional(),
		status: z.string().optional(),
	})
	.passthrough();

export type ProgressCard = z.infer<typeof progressCardSchema>;

export const progressCardListSchema = z
	.object({ cards: z.array(progressCardSchema) })
	.passthrough();

/** [x, y] in slide coordinates */
export type Vertex = readonly [number, number];
