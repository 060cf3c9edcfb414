import { describe, test, expect } from 'vitest';
import { castPolygon, polygonAxes } from './shape-cast';
import type { Vector2D } from '../math';

function box(x: number, y: number, w: number, h: number): Vector2D[] {
	return [
		{ x, y },
		{ x: x + w, y },
		{ x: x + w, y: y + h },
		{ x, y: y + h },
	];
}

// Floor top edge at y = 20 (y points down)
const floor = box(-100, 20, 200, 20);

describe('castPolygon', () => {
	test('box falling onto a floor stops at the gap fraction', () => {
		// Gap of 10 below the box, moving 20 → contact halfway
		const hit = castPolygon(box(0, 0, 10, 10), { x: 0, y: 20 }, floor);
		expect(hit).not.toBeNull();
		expect(hit?.fraction).toBe(0.5);
		expect(hit?.normal.x).toBeCloseTo(0);
		expect(hit?.normal.y).toBeCloseTo(-1);
	});

	test('motion too short to reach the floor misses', () => {
		expect(castPolygon(box(0, 0, 10, 10), { x: 0, y: 5 }, floor)).toBeNull();
	});

	test('contact exactly at the end of the motion is not a collision', () => {
		expect(castPolygon(box(0, 0, 10, 10), { x: 0, y: 10 }, floor)).toBeNull();
	});

	test('moving away from the floor misses', () => {
		expect(castPolygon(box(0, 0, 10, 10), { x: 0, y: -20 }, floor)).toBeNull();
	});

	test('resting box sliding along the floor does not collide', () => {
		expect(castPolygon(box(0, 10, 10, 10), { x: 20, y: 0 }, floor)).toBeNull();
	});

	test('resting box pushed into the floor collides immediately', () => {
		const hit = castPolygon(box(0, 10, 10, 10), { x: 0, y: 5 }, floor);
		expect(hit?.fraction).toBe(0);
		expect(hit?.normal.x).toBeCloseTo(0);
		expect(hit?.normal.y).toBeCloseTo(-1);
	});

	test('overlapping polygons report fraction 0 with the least-penetration normal', () => {
		// Box sunk 5 into the floor
		const hit = castPolygon(box(0, 15, 10, 10), { x: 0, y: 0 }, floor);
		expect(hit?.fraction).toBe(0);
		expect(hit?.normal.x).toBeCloseTo(0);
		expect(hit?.normal.y).toBeCloseTo(-1);
	});

	test('separated polygons with zero motion miss', () => {
		expect(castPolygon(box(0, 0, 10, 10), { x: 0, y: 0 }, floor)).toBeNull();
	});

	test('side hit against a wall reports a horizontal normal', () => {
		const wall = box(20, -50, 20, 100);
		const hit = castPolygon(box(0, 0, 10, 10), { x: 30, y: 0 }, wall);
		expect(hit?.fraction).toBeCloseTo(1 / 3);
		expect(hit?.normal.x).toBeCloseTo(-1);
		expect(hit?.normal.y).toBeCloseTo(0);
	});

	test('passing beside a wall misses', () => {
		const wall = box(20, 50, 20, 100);
		expect(castPolygon(box(0, 0, 10, 10), { x: 30, y: 0 }, wall)).toBeNull();
	});
});

describe('polygonAxes', () => {
	test('returns one unit normal per edge', () => {
		const axes = polygonAxes(box(0, 0, 4, 2));
		expect(axes).toHaveLength(4);
		for (const axis of axes) {
			expect(Math.hypot(axis.x, axis.y)).toBeCloseTo(1);
		}
	});

	test('skips zero-length edges', () => {
		const axes = polygonAxes([{ x: 0, y: 0 }, { x: 0, y: 0 }, { x: 4, y: 0 }, { x: 0, y: 3 }]);
		expect(axes).toHaveLength(3);
	});
});
