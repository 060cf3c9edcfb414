/**
 * Polygon Body
 *
 * A convex polygon that integrates its own motion each fixed step instead of
 * being driven by a physics solver:
 *
 *   integrate gravity → intended motion → sweep query →
 *     no hit: commit the full motion
 *     hit:    commit the safe fraction, fetch the contact normal,
 *             reflect and damp the velocity
 *
 * The collision shape is derived from the point sequence and regenerated
 * synchronously on every point edit.
 */

import {
	vec2Dot,
	vec2Normalize,
	vec2Project,
	vec2Scale,
	vec2Sub,
	type Vector2D,
} from '../math';
import {
	createConvexPolygonShape,
	MIN_POLYGON_POINTS,
	type BodyTransform,
	type ConvexPolygonShape,
} from '../physics/convex-shape';
import type { PhysicsSpace, ShapeQuery } from '../physics/physics-space';
import { createPhysicsSettings, type PhysicsSettings } from '../physics/settings';
import { drawPolygonBody, type PolygonSurface } from '../renderers/polygon-graphics';

// ==================== Types ====================

/**
 * Tunable body parameters. Replace through `configure()`, which validates.
 */
export interface PolygonBodyConfig {
	/** Fill color as 0xRRGGBB */
	color: number;
	/** Outline color as 0xRRGGBB */
	outlineColor: number;
	/** Outline width in pixels (0 = no outline) */
	outlineWidth: number;
	/** Multiplier on world gravity (0 = weightless) */
	gravityScale: number;
	/** Bounciness 0–1 (0 = no bounce, 1 = perfectly elastic) */
	bounce: number;
	/** Tangential damping on contact 0–1 (1 = stops sliding) */
	friction: number;
	/** Layers this body collides with */
	collisionMask: number;
}

export interface PolygonBodyOptions extends Partial<PolygonBodyConfig> {
	/** Local-space vertices. At least 3 are needed for a collision shape. */
	points?: readonly Vector2D[];
	transform?: Partial<BodyTransform>;
	velocity?: Vector2D;
	/** World query service. Steps are skipped while it is absent. */
	space?: PhysicsSpace | null;
	settings?: PhysicsSettings;
}

export type StepSkipReason = 'no-space' | 'no-shape';

/**
 * What a single `step()` did.
 */
export type StepOutcome =
	| { kind: 'moved'; motion: Vector2D }
	| {
		kind: 'collided';
		motion: Vector2D;
		/** Safe fraction of `motion` that was committed */
		fraction: number;
		/** Contact normal, or null when the fallback response was used */
		normal: Vector2D | null;
	}
	| { kind: 'skipped'; reason: StepSkipReason };

// ==================== Default Values ====================

export const DEFAULT_POLYGON_BODY_CONFIG: Readonly<PolygonBodyConfig> = {
	color: 0x4fa3e0,
	outlineColor: 0x1b3a57,
	outlineWidth: 2,
	gravityScale: 1,
	bounce: 0.3,
	friction: 0.2,
	collisionMask: 1,
};

/** Motion whose direction is closer to vertical than this counts as a vertical hit. */
export const FALLBACK_VERTICAL_THRESHOLD = 0.5;

/** Horizontal velocity kept after a vertical hit with no contact normal. */
export const FALLBACK_HORIZONTAL_DAMPING = 0.5;

const DOWN: Readonly<Vector2D> = { x: 0, y: 1 };

// ==================== Validation ====================

function assertUnitInterval(name: string, value: number): void {
	if (!Number.isFinite(value) || value < 0 || value > 1) {
		throw new Error(`PolygonBody: ${name} must be within [0, 1], got ${value}`);
	}
}

function assertFinite(name: string, value: number): void {
	if (!Number.isFinite(value)) {
		throw new Error(`PolygonBody: ${name} must be a finite number, got ${value}`);
	}
}

function validateConfig(config: PolygonBodyConfig): void {
	assertUnitInterval('bounce', config.bounce);
	assertUnitInterval('friction', config.friction);
	assertFinite('gravityScale', config.gravityScale);
	if (!Number.isFinite(config.outlineWidth) || config.outlineWidth < 0) {
		throw new Error(`PolygonBody: outlineWidth must be a non-negative number, got ${config.outlineWidth}`);
	}
	if (!Number.isInteger(config.collisionMask) || config.collisionMask < 0 || config.collisionMask > 0xffffffff) {
		throw new Error(`PolygonBody: collisionMask must be a non-negative 32-bit integer, got ${config.collisionMask}`);
	}
}

function copyPoints(points: readonly Vector2D[]): Vector2D[] {
	return points.map((p) => ({ x: p.x, y: p.y }));
}

// ==================== Body ====================

export class PolygonBody {
	readonly transform: BodyTransform;
	readonly velocity: Vector2D;
	private readonly _config: PolygonBodyConfig;
	private readonly _settings: PhysicsSettings;
	private _space: PhysicsSpace | null;
	private _points: Vector2D[];
	private _shape: ConvexPolygonShape | null = null;
	/** Shape not built yet since construction */
	private _shapePending = true;

	constructor(options?: PolygonBodyOptions) {
		const {
			points = [],
			transform,
			velocity,
			space = null,
			settings = createPhysicsSettings(),
			...config
		} = options ?? {};

		this._config = { ...DEFAULT_POLYGON_BODY_CONFIG, ...config };
		validateConfig(this._config);

		this.transform = {
			x: transform?.x ?? 0,
			y: transform?.y ?? 0,
			rotation: transform?.rotation ?? 0,
		};
		this.velocity = { x: velocity?.x ?? 0, y: velocity?.y ?? 0 };
		this._settings = settings;
		this._space = space;
		this._points = copyPoints(points);
	}

	// ==================== Configuration ====================

	get config(): Readonly<PolygonBodyConfig> {
		return this._config;
	}

	get color(): number {
		return this._config.color;
	}

	get outlineColor(): number {
		return this._config.outlineColor;
	}

	get outlineWidth(): number {
		return this._config.outlineWidth;
	}

	/**
	 * Update tunables. Invalid values throw and leave the config unchanged.
	 */
	configure(changes: Partial<PolygonBodyConfig>): void {
		const next = { ...this._config, ...changes };
		validateConfig(next);
		Object.assign(this._config, next);
	}

	get space(): PhysicsSpace | null {
		return this._space;
	}

	setSpace(space: PhysicsSpace | null): void {
		this._space = space;
	}

	setVelocity(x: number, y: number): void {
		this.velocity.x = x;
		this.velocity.y = y;
	}

	// ==================== Points & Shape ====================

	/** A copy of the point sequence. Edit through `setPoints`/`setPoint`. */
	getPoints(): readonly Readonly<Vector2D>[] {
		return copyPoints(this._points);
	}

	/**
	 * Collision shape for the current points, built on first access.
	 * Null while the points do not span a convex polygon.
	 */
	get shape(): ConvexPolygonShape | null {
		if (this._shapePending) this.regenerateShape();
		return this._shape;
	}

	/**
	 * Replace the point sequence and regenerate the collision shape.
	 * Returns false when the new points do not form a valid shape; the
	 * points are still replaced and the shape is invalidated.
	 */
	setPoints(points: readonly Vector2D[]): boolean {
		this._points = copyPoints(points);
		return this.regenerateShape();
	}

	/**
	 * Move a single vertex. Out-of-range indices leave points and shape untouched.
	 */
	setPoint(index: number, point: Vector2D): boolean {
		if (!Number.isInteger(index) || index < 0 || index >= this._points.length) {
			console.warn(`PolygonBody: point index ${index} is out of range [0, ${this._points.length})`);
			return false;
		}
		const next = copyPoints(this._points);
		next[index] = { x: point.x, y: point.y };
		this._points = next;
		return this.regenerateShape();
	}

	private regenerateShape(): boolean {
		this._shapePending = false;

		if (this._points.length < MIN_POLYGON_POINTS) {
			this._shape = null;
			console.warn(`PolygonBody: at least ${MIN_POLYGON_POINTS} points are needed for a collision shape, got ${this._points.length}`);
			return false;
		}

		if (this._shape?.setPointCloud(this._points)) return true;

		this._shape = createConvexPolygonShape(this._points);
		if (!this._shape) {
			console.warn('PolygonBody: points are collinear or coincident, collision shape cleared');
			return false;
		}
		return true;
	}

	// ==================== Simulation ====================

	/**
	 * Advance the body by one fixed step of `dt` seconds.
	 */
	step(dt: number): StepOutcome {
		const space = this._space;
		if (!space) {
			console.warn('PolygonBody: no physics space available, skipping step');
			return { kind: 'skipped', reason: 'no-space' };
		}

		const shape = this.shape;
		if (!shape) {
			console.warn('PolygonBody: no collision shape available, skipping step');
			return { kind: 'skipped', reason: 'no-shape' };
		}

		const { gravity } = this._settings;
		const { gravityScale, collisionMask } = this._config;
		this.velocity.x += gravity.x * gravityScale * dt;
		this.velocity.y += gravity.y * gravityScale * dt;

		const motion = vec2Scale(this.velocity, dt);
		const query: ShapeQuery = {
			transform: { ...this.transform },
			motion,
			shape,
			collisionMask,
		};

		const hit = space.sweep(query);
		if (hit === null) {
			this.transform.x += motion.x;
			this.transform.y += motion.y;
			return { kind: 'moved', motion };
		}

		const fraction = Math.min(1, Math.max(0, hit));
		this.transform.x += motion.x * fraction;
		this.transform.y += motion.y * fraction;

		const normal = space.contactNormal({ ...query, transform: { ...this.transform } });
		if (normal) {
			this.respondToContact(normal);
		} else {
			this.respondWithoutNormal(motion);
		}

		return { kind: 'collided', motion, fraction, normal };
	}

	/**
	 * Reflect the normal component scaled by bounce, then damp the
	 * tangential component by friction.
	 */
	private respondToContact(normal: Vector2D): void {
		const { bounce, friction } = this._config;
		const normalPart = vec2Project(this.velocity, normal);
		const tangentPart = vec2Sub(this.velocity, normalPart);

		// v - (1 + bounce) * vn leaves vt - bounce * vn
		const next = vec2Sub(vec2Scale(tangentPart, 1 - friction), vec2Scale(normalPart, bounce));
		this.velocity.x = next.x;
		this.velocity.y = next.y;
	}

	private respondWithoutNormal(motion: Vector2D): void {
		const direction = vec2Normalize(motion);
		if (Math.abs(vec2Dot(direction, DOWN)) > FALLBACK_VERTICAL_THRESHOLD) {
			this.velocity.y = 0;
			this.velocity.x *= FALLBACK_HORIZONTAL_DAMPING;
			return;
		}
		this.velocity.x = 0;
		this.velocity.y = 0;
	}

	// ==================== Rendering ====================

	draw(surface: PolygonSurface): void {
		drawPolygonBody(surface, this);
	}
}

/**
 * Create a polygon body.
 *
 * @example
 * ```typescript
 * const space = createStaticPhysicsSpace();
 * const crate = createPolygonBody({
 *   points: [{ x: -20, y: -20 }, { x: 20, y: -20 }, { x: 20, y: 20 }, { x: -20, y: 20 }],
 *   transform: { x: 400, y: 100 },
 *   bounce: 0.5,
 *   space,
 * });
 *
 * loop.addSystem('fixedUpdate', (dt) => { crate.step(dt); });
 * ```
 */
export function createPolygonBody(options?: PolygonBodyOptions): PolygonBody {
	return new PolygonBody(options);
}
