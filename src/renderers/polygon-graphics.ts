/**
 * Polygon body drawing.
 *
 * Draws into any surface with a pixi.js v8 style path API — a
 * `Graphics` instance satisfies `PolygonSurface` directly.
 * Presentation only: nothing here feeds back into the simulation.
 */

import type { Vector2D } from '../math';
import { MIN_POLYGON_POINTS } from '../physics/convex-shape';

/**
 * The subset of pixi's `Graphics` path API used for drawing bodies.
 */
export interface PolygonSurface {
	clear(): unknown;
	poly(points: number[], close?: boolean): unknown;
	circle(x: number, y: number, radius: number): unknown;
	fill(color: number): unknown;
	stroke(style: { width: number; color: number }): unknown;
}

/**
 * What the renderer needs to know about a body.
 */
export interface DrawablePolygon {
	getPoints(): readonly Readonly<Vector2D>[];
	readonly color: number;
	readonly outlineColor: number;
	readonly outlineWidth: number;
}

/** Radius of the marker drawn per point when no polygon can be formed. */
export const POINT_MARKER_RADIUS = 4;

/**
 * Flatten points into the [x0, y0, x1, y1, ...] form pixi expects.
 */
export function flattenPoints(points: readonly Readonly<Vector2D>[]): number[] {
	return points.flatMap((p) => [p.x, p.y]);
}

/**
 * Redraw a body in local space.
 *
 * With at least three points the polygon is filled and outlined; with
 * fewer, a marker circle is drawn at each point.
 */
export function drawPolygonBody(surface: PolygonSurface, body: DrawablePolygon): void {
	const points = body.getPoints();
	surface.clear();

	if (points.length < MIN_POLYGON_POINTS) {
		for (const p of points) {
			surface.circle(p.x, p.y, POINT_MARKER_RADIUS);
			surface.fill(body.color);
		}
		return;
	}

	const flat = flattenPoints(points);
	surface.poly(flat, true);
	surface.fill(body.color);

	if (body.outlineWidth > 0) {
		surface.poly(flat, true);
		surface.stroke({ width: body.outlineWidth, color: body.outlineColor });
	}
}
