/**
 * Soft Body Controller
 *
 * Pushes a deformable body around with four directional actions. Each
 * fixed step the pressed directions become a force of `power * dt` on the
 * horizontal axis and twice that on the vertical axis, handed to the body's
 * force accumulator.
 */

import type { Vector2D } from '../math';
import type { ActionState } from '../input/input';

// ==================== Types ====================

/**
 * A deformable body owned by the host. Forces accumulate until its own
 * solver consumes them.
 */
export interface SoftBody {
	applyForce(force: Vector2D): void;
}

/**
 * Pressed state of the four directions.
 */
export interface DirectionalInput {
	left: boolean;
	right: boolean;
	up: boolean;
	down: boolean;
}

/**
 * Action names read for each direction.
 */
export interface DirectionalBindings {
	left: string;
	right: string;
	up: string;
	down: string;
}

export interface SoftBodyControllerOptions {
	body: SoftBody;
	actions: ActionState;
	/** Force per second along the horizontal axis (default: 400) */
	power?: number;
	/** Action names (default: move_left / move_right / move_up / move_down) */
	bindings?: Partial<DirectionalBindings>;
}

export interface SoftBodyController {
	readonly power: number;
	/** Read input and apply this step's force. Returns the applied force. */
	step(dt: number): Vector2D;
}

// ==================== Defaults ====================

export const DEFAULT_SOFT_BODY_POWER = 400;

export const DEFAULT_DIRECTIONAL_BINDINGS: Readonly<DirectionalBindings> = {
	left: 'move_left',
	right: 'move_right',
	up: 'move_up',
	down: 'move_down',
};

/** Vertical force relative to horizontal. */
export const VERTICAL_POWER_FACTOR = 2;

// ==================== Helpers ====================

/**
 * Force for one step. Each axis is -1, 0 or 1 (opposing keys cancel),
 * y points down, and the vertical magnitude is doubled.
 */
export function computeDirectionalForce(input: DirectionalInput, power: number, dt: number): Vector2D {
	const axisX = Number(input.right) - Number(input.left);
	const axisY = Number(input.down) - Number(input.up);
	return {
		x: axisX * power * dt,
		y: axisY * VERTICAL_POWER_FACTOR * power * dt,
	};
}

/**
 * Read the four directions from an action state.
 */
export function readDirectionalInput(actions: ActionState, bindings: Readonly<DirectionalBindings>): DirectionalInput {
	return {
		left: actions.isActive(bindings.left),
		right: actions.isActive(bindings.right),
		up: actions.isActive(bindings.up),
		down: actions.isActive(bindings.down),
	};
}

// ==================== Factory ====================

/**
 * Create a controller that drives a soft body from directional actions.
 *
 * @example
 * ```typescript
 * const input = createInputState();
 * const controller = createSoftBodyController({ body: blob, actions: input.actions });
 *
 * loop.addSystem('preUpdate', () => input.update());
 * loop.addSystem('fixedUpdate', (dt) => { controller.step(dt); });
 * ```
 */
export function createSoftBodyController(options: SoftBodyControllerOptions): SoftBodyController {
	const {
		body,
		actions,
		power = DEFAULT_SOFT_BODY_POWER,
		bindings: bindingOverrides,
	} = options;

	if (!Number.isFinite(power)) {
		throw new Error(`SoftBodyController: power must be a finite number, got ${power}`);
	}

	const bindings: DirectionalBindings = { ...DEFAULT_DIRECTIONAL_BINDINGS, ...bindingOverrides };

	return {
		power,
		step(dt) {
			const force = computeDirectionalForce(readDirectionalInput(actions, bindings), power, dt);
			body.applyForce(force);
			return force;
		},
	};
}
