/**
 * Fixed-timestep frame loop.
 *
 * Each `update(frameDt)` runs, in order:
 *   preUpdate   once, with the frame delta
 *   fixedUpdate zero or more times, each with the fixed delta
 *   postUpdate  once, with the frame delta
 *   render      once, with the frame delta
 *
 * Frame time accumulates; leftover time carries over to the next frame.
 * Large frame deltas are capped at `maxStepsPerFrame` fixed steps and the
 * surplus is dropped.
 */

export type LoopPhase = 'preUpdate' | 'fixedUpdate' | 'postUpdate' | 'render';

export type SystemProcess = (deltaTime: number) => void;

export interface SystemHandle {
	readonly phase: LoopPhase;
	readonly label: string;
}

export interface FixedStepLoopOptions {
	/** Fixed step duration in seconds (default: 1/60) */
	fixedDt?: number;
	/** Maximum fixed steps per update (default: 8) */
	maxStepsPerFrame?: number;
}

export interface FixedStepLoop {
	readonly fixedDt: number;
	/** Time carried over toward the next fixed step */
	readonly accumulator: number;
	addSystem(phase: LoopPhase, process: SystemProcess, label?: string): SystemHandle;
	removeSystem(handle: SystemHandle): boolean;
	/** Advance by a frame delta. Returns the number of fixed steps run. */
	update(frameDt: number): number;
	/** Run exactly one fixed step, bypassing the accumulator. */
	stepOnce(): void;
}

export const DEFAULT_FIXED_DT = 1 / 60;
export const DEFAULT_MAX_STEPS_PER_FRAME = 8;

const PHASE_ORDER: readonly LoopPhase[] = ['preUpdate', 'fixedUpdate', 'postUpdate', 'render'];

interface RegisteredSystem extends SystemHandle {
	process: SystemProcess;
}

/**
 * Create a fixed-timestep loop.
 *
 * @example
 * ```typescript
 * const loop = createFixedStepLoop({ fixedDt: 1 / 60 });
 * loop.addSystem('fixedUpdate', (dt) => { body.step(dt); });
 *
 * let last = performance.now();
 * function frame(now: number) {
 *   loop.update((now - last) / 1000);
 *   last = now;
 *   requestAnimationFrame(frame);
 * }
 * requestAnimationFrame(frame);
 * ```
 */
export function createFixedStepLoop(options?: FixedStepLoopOptions): FixedStepLoop {
	const {
		fixedDt = DEFAULT_FIXED_DT,
		maxStepsPerFrame = DEFAULT_MAX_STEPS_PER_FRAME,
	} = options ?? {};

	if (!Number.isFinite(fixedDt) || fixedDt <= 0) {
		throw new Error(`FixedStepLoop: fixedDt must be a positive number, got ${fixedDt}`);
	}
	if (!Number.isInteger(maxStepsPerFrame) || maxStepsPerFrame < 1) {
		throw new Error(`FixedStepLoop: maxStepsPerFrame must be a positive integer, got ${maxStepsPerFrame}`);
	}

	const systems: Record<LoopPhase, RegisteredSystem[]> = {
		preUpdate: [],
		fixedUpdate: [],
		postUpdate: [],
		render: [],
	};
	let accumulator = 0;
	let nextLabel = 1;

	function runPhase(phase: LoopPhase, deltaTime: number): void {
		// Copy so systems can add or remove systems while running
		for (const system of [...systems[phase]]) {
			system.process(deltaTime);
		}
	}

	return {
		fixedDt,
		get accumulator() {
			return accumulator;
		},
		addSystem(phase, process, label) {
			const system: RegisteredSystem = {
				phase,
				label: label ?? `system-${nextLabel++}`,
				process,
			};
			systems[phase].push(system);
			return system;
		},
		removeSystem(handle) {
			const list = systems[handle.phase];
			const index = list.findIndex((s) => s === handle);
			if (index === -1) return false;
			list.splice(index, 1);
			return true;
		},
		update(frameDt) {
			if (!Number.isFinite(frameDt) || frameDt < 0) {
				console.warn(`FixedStepLoop: ignoring invalid frame delta ${frameDt}`);
				return 0;
			}

			let steps = 0;
			for (const phase of PHASE_ORDER) {
				if (phase !== 'fixedUpdate') {
					runPhase(phase, frameDt);
					continue;
				}

				accumulator += frameDt;
				while (accumulator >= fixedDt && steps < maxStepsPerFrame) {
					runPhase('fixedUpdate', fixedDt);
					accumulator -= fixedDt;
					steps++;
				}
				if (accumulator >= fixedDt) {
					accumulator = 0;
				}
			}
			return steps;
		},
		stepOnce() {
			runPhase('fixedUpdate', fixedDt);
		},
	};
}
