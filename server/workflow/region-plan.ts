import type { Vertex } from "../viewer/viewer-schemas";
import type { RoiHint } from "./run-context";

export const DEFAULT_REGION_SIZE = 1000;

export interface RegionPlan {
	center: [number, number];
	size: number;
	source: "hint" | "slide_center";
	vertices: Vertex[];
}

/**
 * Square region around the hinted centre, or around the slide centre when
 * there is no hint. Vertices run top-left, top-right, bottom-right,
 * bottom-left.
 */
export function planRegion(
	slide: { width: number; height: number },
	hint: RoiHint | null,
): RegionPlan {
	const [centerX, centerY] = hint
		? hint.center
		: [slide.width / 2, slide.height / 2];
	const size = hint?.size ?? DEFAULT_REGION_SIZE;
	const half = size / 2;

	return {
		center: [centerX, centerY],
		size,
		source: hint ? "hint" : "slide_center",
		vertices: [
			[centerX - half, centerY - half],
			[centerX + half, centerY - half],
			[centerX + half, centerY + half],
			[centerX - half, centerY + half],
		],
	};
}
