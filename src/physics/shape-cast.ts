/**
 * Swept separating-axis test between convex polygons.
 *
 * The moving polygon travels along `motion` over t ∈ [0, 1]; the target is
 * static. On every candidate axis the projections overlap during an
 * interval of t; the polygons touch where all intervals intersect.
 */

import { vec2Dot, vec2Normalize, vec2Perp, vec2Sub, type Vector2D } from '../math';

/** Result of a swept cast. Normal points from the target toward the moving polygon. */
export interface CastHit {
	/** Safe fraction of the motion before first contact, in [0, 1) */
	fraction: number;
	/** Unit surface normal of the target at the contact */
	normal: Vector2D;
}

interface Interval {
	min: number;
	max: number;
}

function projectPolygon(points: readonly Vector2D[], axis: Vector2D): Interval {
	let min = Infinity;
	let max = -Infinity;
	for (const p of points) {
		const d = vec2Dot(p, axis);
		if (d < min) min = d;
		if (d > max) max = d;
	}
	return { min, max };
}

/**
 * Unit edge normals of a polygon. Zero-length edges are skipped.
 */
export function polygonAxes(points: readonly Vector2D[]): Vector2D[] {
	const axes: Vector2D[] = [];
	points.forEach((p, i) => {
		const next = points[(i + 1) % points.length];
		if (!next) return;
		const edge = vec2Sub(next, p);
		if (edge.x === 0 && edge.y === 0) return;
		axes.push(vec2Normalize(vec2Perp(edge)));
	});
	return axes;
}

function negate(v: Vector2D): Vector2D {
	return { x: -v.x, y: -v.y };
}

/**
 * Cast `moving` along `motion` against the static `target` polygon.
 *
 * Returns null when the polygons never overlap during the motion, including
 * when they only touch and slide along or away from each other, or when
 * first contact happens exactly at the end of the motion. Polygons that
 * already overlap report fraction 0 with the axis of least penetration.
 */
export function castPolygon(
	moving: readonly Vector2D[],
	motion: Vector2D,
	target: readonly Vector2D[],
): CastHit | null {
	let enter = -Infinity;
	let exit = Infinity;
	let enterNormal: Vector2D | null = null;

	let minDepth = Infinity;
	let depthNormal: Vector2D | null = null;

	for (const axis of [...polygonAxes(moving), ...polygonAxes(target)]) {
		const a = projectPolygon(moving, axis);
		const b = projectPolygon(target, axis);
		const speed = vec2Dot(motion, axis);

		// Separation along the axis now, measured toward either side
		const aBelow = b.min - a.max;
		const aAbove = a.min - b.max;

		if (speed === 0) {
			if (aBelow >= 0 || aAbove >= 0) return null;
		} else {
			let t0 = aBelow / speed;
			let t1 = (b.max - a.min) / speed;
			if (t0 > t1) {
				const swap = t0;
				t0 = t1;
				t1 = swap;
			}

			if (t0 > enter) {
				enter = t0;
				enterNormal = speed > 0 ? negate(axis) : axis;
			}
			if (t1 < exit) exit = t1;
			if (enter >= exit) return null;
		}

		const depthFromBelow = a.max - b.min;
		const depthFromAbove = b.max - a.min;
		const depth = Math.min(depthFromBelow, depthFromAbove);
		if (depth < minDepth) {
			minDepth = depth;
			depthNormal = depthFromBelow < depthFromAbove ? negate(axis) : axis;
		}
	}

	if (exit <= 0 || enter >= 1) return null;

	if (enter >= 0 && enterNormal) {
		return { fraction: enter, normal: enterNormal };
	}

	if (!depthNormal) return null;
	return { fraction: 0, normal: depthNormal };
}
