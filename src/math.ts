/**
 * 2D vector math shared by bodies, shapes and the physics space.
 * All functions are pure — they return new vectors, never mutate inputs.
 */

/**
 * A 2D vector with x and y components.
 */
export interface Vector2D {
	x: number;
	y: number;
}

/**
 * Create a Vector2D from x and y components.
 */
export function vec2(x: number, y: number): Vector2D {
	return { x, y };
}

/**
 * Return a zero vector {x: 0, y: 0}.
 */
export function vec2Zero(): Vector2D {
	return { x: 0, y: 0 };
}

export function vec2Add(a: Vector2D, b: Vector2D): Vector2D {
	return { x: a.x + b.x, y: a.y + b.y };
}

export function vec2Sub(a: Vector2D, b: Vector2D): Vector2D {
	return { x: a.x - b.x, y: a.y - b.y };
}

export function vec2Scale(v: Vector2D, scalar: number): Vector2D {
	return { x: v.x * scalar, y: v.y * scalar };
}

export function vec2Dot(a: Vector2D, b: Vector2D): number {
	return a.x * b.x + a.y * b.y;
}

/**
 * 2D cross product (z-component of the 3D cross product).
 * Positive when b is counter-clockwise from a in a y-up frame.
 */
export function vec2Cross(a: Vector2D, b: Vector2D): number {
	return a.x * b.y - a.y * b.x;
}

/**
 * Squared length. Avoids sqrt when only comparing magnitudes.
 */
export function vec2LengthSq(v: Vector2D): number {
	return v.x * v.x + v.y * v.y;
}

export function vec2Length(v: Vector2D): number {
	return Math.sqrt(v.x * v.x + v.y * v.y);
}

/**
 * Unit vector in the same direction. Returns a zero vector if input is zero-length.
 */
export function vec2Normalize(v: Vector2D): Vector2D {
	const len = Math.sqrt(v.x * v.x + v.y * v.y);
	if (len === 0) return { x: 0, y: 0 };
	return { x: v.x / len, y: v.y / len };
}

/**
 * Project `v` onto the direction of `onto`.
 * `onto` does not need to be normalized; a zero `onto` yields a zero vector.
 */
export function vec2Project(v: Vector2D, onto: Vector2D): Vector2D {
	const lenSq = onto.x * onto.x + onto.y * onto.y;
	if (lenSq === 0) return { x: 0, y: 0 };
	const scale = (v.x * onto.x + v.y * onto.y) / lenSq;
	return { x: onto.x * scale, y: onto.y * scale };
}

/**
 * Perpendicular vector, rotated a quarter turn: (x, y) → (-y, x).
 */
export function vec2Perp(v: Vector2D): Vector2D {
	return { x: -v.y, y: v.x };
}

/**
 * Rotate a vector by `angle` radians.
 */
export function vec2Rotate(v: Vector2D, angle: number): Vector2D {
	if (angle === 0) return { x: v.x, y: v.y };
	const cos = Math.cos(angle);
	const sin = Math.sin(angle);
	return {
		x: v.x * cos - v.y * sin,
		y: v.x * sin + v.y * cos,
	};
}

/**
 * Check if two vectors are approximately equal within an epsilon tolerance.
 */
export function vec2Equals(a: Vector2D, b: Vector2D, epsilon = 1e-10): boolean {
	return Math.abs(a.x - b.x) <= epsilon && Math.abs(a.y - b.y) <= epsilon;
}
