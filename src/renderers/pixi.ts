/**
 * pixi.js adapter for polygon bodies.
 *
 * pixi.js is loaded on first use so the simulation modules can run
 * without a renderer (headless tests, servers).
 */

import type { Graphics } from 'pixi.js';
import type { BodyTransform } from '../physics/convex-shape';
import { drawPolygonBody, type DrawablePolygon } from './polygon-graphics';

export interface RenderablePolygonBody extends DrawablePolygon {
	readonly transform: Readonly<BodyTransform>;
}

/**
 * Copy the body's transform onto the graphics and redraw its outline.
 */
export function syncPolygonBodyGraphics(graphics: Graphics, body: RenderablePolygonBody): void {
	graphics.position.set(body.transform.x, body.transform.y);
	graphics.rotation = body.transform.rotation;
	drawPolygonBody(graphics, body);
}

/**
 * Create a pixi `Graphics` for a body, positioned and drawn once.
 * Call `syncPolygonBodyGraphics` each render frame afterwards.
 */
export async function createPolygonBodyGraphics(body: RenderablePolygonBody): Promise<Graphics> {
	const { Graphics: GraphicsClass } = await import('pixi.js');
	const graphics = new GraphicsClass();
	syncPolygonBodyGraphics(graphics, body);
	return graphics;
}
