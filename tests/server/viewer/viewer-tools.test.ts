import { describe, expect, it } from "vitest";
import { ProtocolError } from "../../../server/mcp/mcp-errors";
import { ViewerTools } from "../../../server/viewer/viewer-tools";
import { ScriptedToolCaller } from "../../fixtures/viewer-tools";

describe("ViewerTools", () => {
	it("maps camera moves onto the wire argument names", async () => {
		const caller = new ScriptedToolCaller({ move_camera: () => ({ token: "move-4" }) });
		const tools = new ViewerTools(caller);

		const token = await tools.moveCamera({ centerX: 5_000, centerY: 4_000, zoom: 2 });

		expect(token).toBe("move-4");
		expect(caller.callsTo("move_camera")).toEqual([
			{ center_x: 5_000, center_y: 4_000, zoom: 2, duration_ms: 300 },
		]);
	});

	it("sends vertices as plain coordinate pairs with an optional name", async () => {
		const caller = new ScriptedToolCaller({
			create_annotation: () => ({ id: 12, name: "ROI-abc" }),
		});
		const tools = new ViewerTools(caller);

		const annotation = await tools.createAnnotation(
			[
				[0, 0],
				[10, 0],
				[10, 10],
			],
			"ROI-abc",
		);

		expect(annotation).toMatchObject({ id: 12, name: "ROI-abc" });
		expect(caller.callsTo("create_annotation")).toEqual([
			{
				vertices: [
					[0, 0],
					[10, 0],
					[10, 10],
				],
				name: "ROI-abc",
			},
		]);
	});

	it("omits optional arguments that were not given", async () => {
		const caller = new ScriptedToolCaller({
			create_action_card: () => ({ id: 5 }),
			capture_snapshot: () => ({}),
		});
		const tools = new ViewerTools(caller);

		const card = await tools.createProgressCard({ title: "Analysis" });
		await tools.captureSnapshot({ width: 640 });

		expect(card.id).toBe("5");
		expect(caller.callsTo("create_action_card")).toEqual([{ title: "Analysis" }]);
		expect(caller.callsTo("capture_snapshot")).toEqual([{ width: 640 }]);
	});

	it("keeps fields the viewer adds beyond the known shape", async () => {
		const caller = new ScriptedToolCaller({
			get_slide_info: () => ({ width: 10, height: 20, levels: 1, mpp: 0.25 }),
		});

		const info = await new ViewerTools(caller).getSlideInfo();

		expect(info).toEqual({ width: 10, height: 20, levels: 1, mpp: 0.25 });
	});

	it("raises ProtocolError for a result of the wrong shape", async () => {
		const caller = new ScriptedToolCaller({ reset_view: () => ({ zoom: "far" }) });

		const error: unknown = await new ViewerTools(caller)
			.resetView()
			.catch((err: unknown) => err);

		expect(error).toBeInstanceOf(ProtocolError);
		expect(error).toMatchObject({ code: "PROTOCOL_ERROR" });
		expect(String(error)).toContain("Unexpected reset_view result");
	});

	it("reads the annotation list out of its envelope", async () => {
		const caller = new ScriptedToolCaller({
			list_annotations: () => ({ annotations: [{ id: 1 }, { id: 2, area: 40 }] }),
		});

		const annotations = await new ViewerTools(caller).listAnnotations(true);

		expect(annotations.map((annotation) => annotation.id)).toEqual([1, 2]);
		expect(caller.callsTo("list_annotations")).toEqual([{ include_metrics: true }]);
	});

	const VIEWPORT = { position: { x: 10, y: 20 }, zoom: 1.5 };

	it.each([
		{
			tool: "pan",
			invoke: (tools: ViewerTools) => tools.pan(-40, 25),
			reply: VIEWPORT,
			args: { dx: -40, dy: 25 },
			result: VIEWPORT,
		},
		{
			tool: "zoom",
			invoke: (tools: ViewerTools) => tools.zoom(0.5),
			reply: VIEWPORT,
			args: { delta: 0.5 },
			result: VIEWPORT,
		},
		{
			tool: "zoom_at_point",
			invoke: (tools: ViewerTools) => tools.zoomAtPoint(320, 240, -1),
			reply: VIEWPORT,
			args: { screen_x: 320, screen_y: 240, delta: -1 },
			result: VIEWPORT,
		},
		{
			tool: "center_on",
			invoke: (tools: ViewerTools) => tools.centerOn(5_000, 4_000),
			reply: VIEWPORT,
			args: { x: 5_000, y: 4_000 },
			result: VIEWPORT,
		},
		{
			tool: "nav_lock_status",
			invoke: (tools: ViewerTools) => tools.navLockStatus(),
			reply: { locked: true, owner_uuid: "run-1", time_remaining_ms: 900 },
			args: {},
			result: { locked: true, owner_uuid: "run-1", time_remaining_ms: 900 },
		},
		{
			tool: "get_annotation",
			invoke: (tools: ViewerTools) => tools.getAnnotation(7),
			reply: { id: 7, name: "ROI-1", area: 12.5 },
			args: { id: 7 },
			result: { id: 7, name: "ROI-1", area: 12.5 },
		},
		{
			tool: "delete_annotation",
			invoke: (tools: ViewerTools) => tools.deleteAnnotation(7),
			reply: { success: true },
			args: { id: 7 },
			result: true,
		},
		{
			tool: "delete_annotation",
			invoke: (tools: ViewerTools) => tools.deleteAnnotation(8),
			reply: {},
			args: { id: 8 },
			result: false,
		},
		{
			tool: "load_polygons",
			invoke: (tools: ViewerTools) => tools.loadPolygons("/slides/case-1.polygons.bin"),
			reply: { polygon_count: 420, class_count: 3 },
			args: { path: "/slides/case-1.polygons.bin" },
			result: { polygon_count: 420, class_count: 3 },
		},
		{
			tool: "query_polygons",
			invoke: (tools: ViewerTools) =>
				tools.queryPolygons({ x: 100, y: 200, w: 300, h: 400 }),
			reply: { polygons: [] },
			args: { x: 100, y: 200, w: 300, h: 400 },
			result: { polygons: [] },
		},
		{
			tool: "set_polygon_visibility",
			invoke: (tools: ViewerTools) => tools.setPolygonVisibility(false),
			reply: { visible: false },
			args: { visible: false },
			result: { visible: false },
		},
		{
			tool: "list_action_cards",
			invoke: (tools: ViewerTools) => tools.listProgressCards(),
			reply: { cards: [{ id: 3, title: "Analysis" }], total: 1 },
			args: {},
			result: [{ id: "3", title: "Analysis" }],
		},
		{
			tool: "delete_action_card",
			invoke: (tools: ViewerTools) => tools.deleteProgressCard("3"),
			reply: { success: true },
			args: { id: "3" },
			result: true,
		},
	])("$tool sends its wire arguments and unwraps the reply", async (row) => {
		const caller = new ScriptedToolCaller({ [row.tool]: () => row.reply });

		const result = await row.invoke(new ViewerTools(caller));

		expect(result).toEqual(row.result);
		expect(caller.callsTo(row.tool)).toEqual([row.args]);
	});
});
