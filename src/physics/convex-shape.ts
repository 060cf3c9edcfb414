/**
 * Convex polygon collision shapes.
 *
 * A shape stores the convex hull of a point cloud in local coordinates.
 * Hull vertices are counter-clockwise in a y-up frame (clockwise on a
 * y-down screen) with duplicate and collinear points removed.
 */

import { vec2Cross, vec2Rotate, vec2Sub, type Vector2D } from '../math';

// ==================== Types ====================

/**
 * Position and rotation (radians) of a body in world space.
 */
export interface BodyTransform {
	x: number;
	y: number;
	rotation: number;
}

/**
 * Axis-aligned bounds of a point set.
 */
export interface Bounds {
	minX: number;
	minY: number;
	maxX: number;
	maxY: number;
}

export const IDENTITY_TRANSFORM: Readonly<BodyTransform> = {
	x: 0,
	y: 0,
	rotation: 0,
};

/** Minimum number of hull vertices for a usable shape. */
export const MIN_POLYGON_POINTS = 3;

// ==================== Hull ====================

function comparePoints(a: Vector2D, b: Vector2D): number {
	return a.x === b.x ? a.y - b.y : a.x - b.x;
}

function cross3(o: Vector2D, a: Vector2D, b: Vector2D): number {
	return vec2Cross(vec2Sub(a, o), vec2Sub(b, o));
}

function buildChain(sorted: readonly Vector2D[]): Vector2D[] {
	const chain: Vector2D[] = [];
	for (const p of sorted) {
		while (chain.length >= 2) {
			const a = chain[chain.length - 2];
			const b = chain[chain.length - 1];
			if (!a || !b || cross3(a, b, p) > 0) break;
			chain.pop();
		}
		chain.push(p);
	}
	return chain;
}

/**
 * Compute the convex hull of a point cloud (Andrew's monotone chain).
 *
 * Returns fresh point objects, counter-clockwise in a y-up frame, starting
 * from the lowest-x (then lowest-y) point. Fewer than three distinct,
 * non-collinear input points yield a hull with fewer than three vertices.
 */
export function computeConvexHull(points: readonly Vector2D[]): Vector2D[] {
	const sorted = points
		.map((p) => ({ x: p.x, y: p.y }))
		.sort(comparePoints);

	if (sorted.length < 3) return sorted;

	const lower = buildChain(sorted);
	const upper = buildChain([...sorted].reverse());

	// Last point of each chain is the first point of the other
	lower.pop();
	upper.pop();
	return lower.concat(upper);
}

// ==================== Transform Helpers ====================

/**
 * Map local points into world space: rotate by the transform's rotation,
 * then translate by its position.
 */
export function transformPoints(points: readonly Vector2D[], transform: Readonly<BodyTransform>): Vector2D[] {
	return points.map((p) => {
		const r = vec2Rotate(p, transform.rotation);
		return { x: r.x + transform.x, y: r.y + transform.y };
	});
}

export function computeBounds(points: readonly Vector2D[]): Bounds {
	let minX = Infinity;
	let minY = Infinity;
	let maxX = -Infinity;
	let maxY = -Infinity;
	for (const p of points) {
		if (p.x < minX) minX = p.x;
		if (p.y < minY) minY = p.y;
		if (p.x > maxX) maxX = p.x;
		if (p.y > maxY) maxY = p.y;
	}
	return { minX, minY, maxX, maxY };
}

// ==================== Shape ====================

/**
 * A convex collision shape whose hull is regenerated in place.
 */
export class ConvexPolygonShape {
	private _points: readonly Readonly<Vector2D>[];

	private constructor(hull: Vector2D[]) {
		this._points = hull;
	}

	/**
	 * Build a shape from a point cloud.
	 * Returns null when the cloud does not span a polygon.
	 */
	static fromPointCloud(points: readonly Vector2D[]): ConvexPolygonShape | null {
		const hull = computeConvexHull(points);
		if (hull.length < MIN_POLYGON_POINTS) return null;
		return new ConvexPolygonShape(hull);
	}

	/** Hull vertices in local coordinates. */
	get points(): readonly Readonly<Vector2D>[] {
		return this._points;
	}

	/**
	 * Replace the hull with that of a new point cloud.
	 * Leaves the shape untouched and returns false if the new hull is degenerate.
	 */
	setPointCloud(points: readonly Vector2D[]): boolean {
		const hull = computeConvexHull(points);
		if (hull.length < MIN_POLYGON_POINTS) return false;
		this._points = hull;
		return true;
	}

	/** Hull vertices placed in world space by `transform`. */
	toWorld(transform: Readonly<BodyTransform>): Vector2D[] {
		return transformPoints(this._points, transform);
	}
}

/**
 * Create a convex polygon shape, or null when fewer than three hull vertices remain.
 */
export function createConvexPolygonShape(points: readonly Vector2D[]): ConvexPolygonShape | null {
	return ConvexPolygonShape.fromPointCloud(points);
}
