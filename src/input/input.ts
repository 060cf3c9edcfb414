/**
 * Keyboard input with named actions.
 *
 * Key events are accumulated between frames and snapshotted once per frame
 * by `update()`, so every consumer within a frame sees the same state.
 * Call `attach()` to start listening and `detach()` to remove listeners.
 */

// ==================== Public Types ====================

export interface KeyboardState {
	isDown(key: string): boolean;
	justPressed(key: string): boolean;
	justReleased(key: string): boolean;
}

export interface ActionState {
	isActive(action: string): boolean;
	justActivated(action: string): boolean;
	justDeactivated(action: string): boolean;
}

export interface ActionBinding {
	keys: string[];
}

export type ActionMap = Record<string, ActionBinding>;

export interface InputState {
	readonly keyboard: KeyboardState;
	readonly actions: ActionState;
	setActionMap(actions: ActionMap): void;
	getActionMap(): Readonly<ActionMap>;
	/** Start listening for key events on the target. Idempotent. */
	attach(): void;
	/** Remove all listeners. Held keys are released on the next update. */
	detach(): void;
	/** Snapshot events accumulated since the previous update. Call once per frame. */
	update(): void;
}

export interface InputOptions {
	/** Initial action mappings (default: DIRECTIONAL_ACTIONS) */
	actions?: ActionMap;
	/** EventTarget to attach listeners to (default: globalThis). Pass a custom target for testability. */
	target?: EventTarget;
}

// ==================== Action Maps ====================

/**
 * Define an action map with proper typing.
 *
 * @example
 * ```typescript
 * const actions = defineActionMap({
 *   jump: { keys: [' ', 'ArrowUp'] },
 *   squash: { keys: ['x'] },
 * });
 * ```
 */
export function defineActionMap<T extends ActionMap>(map: T): T {
	return map;
}

/**
 * The four directional actions read by the soft-body controller,
 * bound to the arrow keys and WASD.
 */
export const DIRECTIONAL_ACTIONS = defineActionMap({
	move_left: { keys: ['ArrowLeft', 'a'] },
	move_right: { keys: ['ArrowRight', 'd'] },
	move_up: { keys: ['ArrowUp', 'w'] },
	move_down: { keys: ['ArrowDown', 's'] },
});

function copyActionMap(map: ActionMap): ActionMap {
	const copy: ActionMap = {};
	for (const [name, binding] of Object.entries(map)) {
		copy[name] = { keys: [...binding.keys] };
	}
	return copy;
}

// ==================== Internal Types ====================

interface RawKeyboardState {
	keysDown: Set<string>;
	keysPressed: string[];
	keysReleased: string[];
}

interface FrameSnapshot {
	keysDown: ReadonlySet<string>;
	keysPressed: ReadonlySet<string>;
	keysReleased: ReadonlySet<string>;
	actionsActive: ReadonlySet<string>;
	prevActionsActive: ReadonlySet<string>;
}

const EMPTY_SET: ReadonlySet<string> = new Set<string>();

function createEmptySnapshot(): FrameSnapshot {
	return {
		keysDown: EMPTY_SET,
		keysPressed: EMPTY_SET,
		keysReleased: EMPTY_SET,
		actionsActive: EMPTY_SET,
		prevActionsActive: EMPTY_SET,
	};
}

function computeActiveActions(actionMap: ActionMap, keysDown: ReadonlySet<string>): Set<string> {
	const active = new Set<string>();
	for (const [name, binding] of Object.entries(actionMap)) {
		if (binding.keys.some((k) => keysDown.has(k))) {
			active.add(name);
		}
	}
	return active;
}

function snapshotRaw(raw: RawKeyboardState, prevActionsActive: ReadonlySet<string>, actionMap: ActionMap): FrameSnapshot {
	const keysDown = new Set(raw.keysDown);
	const snapshot: FrameSnapshot = {
		keysDown,
		keysPressed: new Set(raw.keysPressed),
		keysReleased: new Set(raw.keysReleased),
		actionsActive: computeActiveActions(actionMap, keysDown),
		prevActionsActive,
	};

	raw.keysPressed = [];
	raw.keysReleased = [];

	return snapshot;
}

function readKey(event: Event): { key: string; repeat: boolean } | null {
	if (!('key' in event) || typeof event.key !== 'string') return null;
	return { key: event.key, repeat: 'repeat' in event && event.repeat === true };
}

// ==================== Factory ====================

/**
 * Create a keyboard input state.
 *
 * @example
 * ```typescript
 * const input = createInputState();
 * input.attach();
 *
 * loop.addSystem('preUpdate', () => input.update());
 * loop.addSystem('fixedUpdate', () => {
 *   if (input.actions.isActive('move_left')) { ... }
 * });
 * ```
 */
export function createInputState(options?: InputOptions): InputState {
	const {
		actions: initialActions = DIRECTIONAL_ACTIONS,
		target = globalThis,
	} = options ?? {};

	const raw: RawKeyboardState = {
		keysDown: new Set(),
		keysPressed: [],
		keysReleased: [],
	};
	let snapshot = createEmptySnapshot();
	let actionMap = copyActionMap(initialActions);
	const cleanupFns: Array<() => void> = [];

	function onKeyDown(e: Event) {
		const ke = readKey(e);
		if (!ke || ke.repeat) return;
		raw.keysDown.add(ke.key);
		raw.keysPressed.push(ke.key);
	}

	function onKeyUp(e: Event) {
		const ke = readKey(e);
		if (!ke) return;
		raw.keysDown.delete(ke.key);
		raw.keysReleased.push(ke.key);
	}

	function addListener(type: string, handler: (e: Event) => void) {
		target.addEventListener(type, handler);
		cleanupFns.push(() => target.removeEventListener(type, handler));
	}

	return {
		keyboard: {
			isDown: (key) => snapshot.keysDown.has(key),
			justPressed: (key) => snapshot.keysPressed.has(key),
			justReleased: (key) => snapshot.keysReleased.has(key),
		},
		actions: {
			isActive: (action) => snapshot.actionsActive.has(action),
			justActivated: (action) =>
				snapshot.actionsActive.has(action) && !snapshot.prevActionsActive.has(action),
			justDeactivated: (action) =>
				!snapshot.actionsActive.has(action) && snapshot.prevActionsActive.has(action),
		},
		setActionMap(newMap) {
			actionMap = copyActionMap(newMap);
		},
		getActionMap() {
			return copyActionMap(actionMap);
		},
		attach() {
			if (cleanupFns.length > 0) return;
			addListener('keydown', onKeyDown);
			addListener('keyup', onKeyUp);
		},
		detach() {
			for (const cleanup of cleanupFns) {
				cleanup();
			}
			cleanupFns.length = 0;
			for (const key of raw.keysDown) {
				raw.keysReleased.push(key);
			}
			raw.keysDown.clear();
		},
		update() {
			snapshot = snapshotRaw(raw, snapshot.actionsActive, actionMap);
		},
	};
}
