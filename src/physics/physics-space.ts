/**
 * Physics world query service.
 *
 * Bodies that integrate their own motion ask a `PhysicsSpace` two
 * questions each step: how far can this shape travel along a motion before
 * it touches something (`sweep`), and what surface does it rest against
 * (`contactNormal`). Engines provide their own implementation; the static
 * space below answers both against fixed convex polygons.
 */

import type { Vector2D } from '../math';
import {
	computeBounds,
	computeConvexHull,
	transformPoints,
	IDENTITY_TRANSFORM,
	MIN_POLYGON_POINTS,
	type BodyTransform,
	type Bounds,
	type ConvexPolygonShape,
} from './convex-shape';
import { castPolygon, type CastHit } from './shape-cast';

// ==================== Query Types ====================

/**
 * A shape placed at `transform`, moving by `motion`, colliding with
 * everything whose layer shares a bit with `collisionMask`.
 */
export interface ShapeQuery {
	transform: Readonly<BodyTransform>;
	motion: Readonly<Vector2D>;
	shape: ConvexPolygonShape;
	collisionMask: number;
}

export interface PhysicsSpace {
	/** Safe fraction of `motion` in [0, 1], or null when nothing is hit. */
	sweep(query: ShapeQuery): number | null;
	/** Surface normal at the first contact along `motion`, or null. */
	contactNormal(query: ShapeQuery): Vector2D | null;
}

// ==================== Collision Layers ====================

const MAX_LAYERS = 32;

/**
 * Assign one bit per layer name, in order.
 *
 * @example
 * ```typescript
 * const layers = defineCollisionLayers(['world', 'player', 'pickup']);
 * // { world: 1, player: 2, pickup: 4 }
 * ```
 */
export function defineCollisionLayers<const L extends string>(names: readonly L[]): Record<L, number> {
	if (names.length > MAX_LAYERS) {
		throw new Error(`Cannot define ${names.length} collision layers: at most ${MAX_LAYERS} fit in a mask`);
	}
	const layers = {} as Record<L, number>;
	names.forEach((name, index) => {
		layers[name] = (1 << index) >>> 0;
	});
	return layers;
}

/**
 * Combine named layer bits into a mask.
 */
export function layerMask<L extends string>(layers: Readonly<Record<L, number>>, ...names: L[]): number {
	return names.reduce((mask, name) => (mask | layers[name]) >>> 0, 0);
}

// ==================== Static Space ====================

export interface StaticCollider {
	readonly id: number;
	/** Convex hull in world space */
	readonly points: readonly Readonly<Vector2D>[];
	readonly layer: number;
	readonly bounds: Readonly<Bounds>;
}

export interface StaticColliderOptions {
	/** Polygon vertices, local to `transform`. The convex hull is used. */
	points: readonly Vector2D[];
	transform?: Readonly<BodyTransform>;
	/** Layer bits (default: 1) */
	layer?: number;
}

export interface StaticPhysicsSpaceOptions {
	colliders?: readonly StaticColliderOptions[];
}

export interface StaticCastHit extends CastHit {
	colliderId: number;
}

export interface StaticPhysicsSpace extends PhysicsSpace {
	/** Add a convex collider. Returns its id, or null for a degenerate polygon. */
	addCollider(options: StaticColliderOptions): number | null;
	removeCollider(id: number): boolean;
	getColliders(): readonly StaticCollider[];
	clear(): void;
	/** Earliest hit along the query motion, with the collider that was hit. */
	castShape(query: ShapeQuery): StaticCastHit | null;
}

function sweptBounds(points: readonly Vector2D[], motion: Readonly<Vector2D>): Bounds {
	const start = computeBounds(points);
	return {
		minX: Math.min(start.minX, start.minX + motion.x),
		minY: Math.min(start.minY, start.minY + motion.y),
		maxX: Math.max(start.maxX, start.maxX + motion.x),
		maxY: Math.max(start.maxY, start.maxY + motion.y),
	};
}

function boundsDisjoint(a: Bounds, b: Bounds): boolean {
	return a.maxX < b.minX || b.maxX < a.minX || a.maxY < b.minY || b.maxY < a.minY;
}

/**
 * Create an in-process physics space of static convex polygons.
 *
 * @example
 * ```typescript
 * const space = createStaticPhysicsSpace();
 * space.addCollider({
 *   points: [{ x: 0, y: 0 }, { x: 800, y: 0 }, { x: 800, y: 40 }, { x: 0, y: 40 }],
 *   transform: { x: 0, y: 560, rotation: 0 },
 * });
 * ```
 */
export function createStaticPhysicsSpace(options?: StaticPhysicsSpaceOptions): StaticPhysicsSpace {
	const colliders = new Map<number, StaticCollider>();
	let nextId = 1;

	function addCollider(collider: StaticColliderOptions): number | null {
		const {
			points,
			transform = IDENTITY_TRANSFORM,
			layer = 1,
		} = collider;

		const hull = computeConvexHull(transformPoints(points, transform));
		if (hull.length < MIN_POLYGON_POINTS) {
			console.warn(`StaticPhysicsSpace: collider needs at least ${MIN_POLYGON_POINTS} non-collinear points, got ${points.length}`);
			return null;
		}

		const id = nextId++;
		colliders.set(id, {
			id,
			points: hull,
			layer: layer >>> 0,
			bounds: computeBounds(hull),
		});
		return id;
	}

	function castShape(query: ShapeQuery): StaticCastHit | null {
		const moving = query.shape.toWorld(query.transform);
		const swept = sweptBounds(moving, query.motion);
		let best: StaticCastHit | null = null;

		for (const collider of colliders.values()) {
			if ((collider.layer & query.collisionMask) === 0) continue;
			if (boundsDisjoint(swept, collider.bounds)) continue;

			const hit = castPolygon(moving, query.motion, collider.points);
			if (!hit) continue;
			if (!best || hit.fraction < best.fraction) {
				best = { ...hit, colliderId: collider.id };
			}
		}

		return best;
	}

	for (const collider of options?.colliders ?? []) {
		addCollider(collider);
	}

	return {
		addCollider,
		removeCollider: (id) => colliders.delete(id),
		getColliders: () => Array.from(colliders.values(), (c) => ({
			...c,
			points: c.points.map((p) => ({ x: p.x, y: p.y })),
			bounds: { ...c.bounds },
		})),
		clear: () => colliders.clear(),
		castShape,
		sweep: (query) => castShape(query)?.fraction ?? null,
		contactNormal: (query) => castShape(query)?.normal ?? null,
	};
}
