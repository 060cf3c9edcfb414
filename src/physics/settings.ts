/**
 * Project-wide physics settings shared by every body in a scene.
 */

import type { Vector2D } from '../math';

export interface PhysicsSettings {
	/** Gravity acceleration in units/sec² (y points down) */
	gravity: Vector2D;
}

/** 980 px/s² downward, matching a 100 px = 1 m scene. */
export const DEFAULT_GRAVITY: Readonly<Vector2D> = { x: 0, y: 980 };

/**
 * Create a physics settings object. Overrides are copied, never shared.
 */
export function createPhysicsSettings(overrides?: Partial<PhysicsSettings>): PhysicsSettings {
	const { gravity = DEFAULT_GRAVITY } = overrides ?? {};
	if (!Number.isFinite(gravity.x) || !Number.isFinite(gravity.y)) {
		throw new Error(`PhysicsSettings: gravity must be finite, got (${gravity.x}, ${gravity.y})`);
	}
	return { gravity: { x: gravity.x, y: gravity.y } };
}
