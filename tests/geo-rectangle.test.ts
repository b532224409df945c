import { describe, expect, it } from 'vitest';

import { metersToDegreesLat, metersToDegreesLonAtLat } from '../src/geometry/geo.js';
import { GeoPoint } from '../src/geometry/geo-point.js';
import { GeoRectangle } from '../src/geometry/geo-rectangle.js';
import { GeoVector } from '../src/geometry/geo-vector.js';

function rect(south: number, west: number, north: number, east: number): GeoRectangle {
	return new GeoRectangle(new GeoPoint(south, west), new GeoPoint(north, east));
}

describe('GeoRectangle', () => {
	it('covers the whole world', () => {
		const world = GeoRectangle.world();
		expect(world.containsPoint(new GeoPoint(-90, -180))).toBe(true);
		expect(world.containsPoint(new GeoPoint(-90, 180))).toBe(true);
		expect(world.containsPoint(new GeoPoint(90, -180))).toBe(true);
		expect(world.containsPoint(new GeoPoint(90, 180))).toBe(true);
		expect(world.containsPoint(new GeoPoint(0, 0))).toBe(true);
	});

	it('normalizes swapped latitudes', () => {
		expect(rect(3, 4, -1, -2).toString()).toBe('[(-1, 4) - (3, -2)]');
	});

	it('is wrapped when west lies east of east', () => {
		expect(rect(0, 0, 1, 1).isWrapped()).toBe(false);
		expect(rect(1, 1, 0, 0).isWrapped()).toBe(true);
		expect(rect(0, 160, 2, -160).easting).toBe(40);
		expect(rect(0, 160, 2, -160).northing).toBe(2);
		expect(rect(0, 160, 2, -160).surface).toBe(80);
	});

	it('splits at the antimeridian', () => {
		expect(rect(0, 170, 1, -170).split().map((part) => part.toString())).toEqual([
			'[(0, -180) - (1, -170)]',
			'[(0, 170) - (1, 179.999999999999)]'
		]);
		const plain = rect(0, 0, 1, 1);
		expect(plain.split()).toEqual([plain]);
	});

	it('finds its center across the antimeridian', () => {
		expect(rect(0, 160, 2, -160).center.toString()).toBe('(1, -180)');
		expect(rect(0, 0, 2, 4).center.toString()).toBe('(1, 2)');
		const withElevation = new GeoRectangle(new GeoPoint(0, 0, 10), new GeoPoint(2, 2, 20));
		expect(withElevation.center.elevationMeters).toBe(15);
	});

	it('tests overlap', () => {
		const a1 = rect(1, 1, 1, 1);
		const a2 = rect(0, 0, 2, 2);
		const a3 = rect(0, 0, 0.5, 0.5);
		const a4 = rect(1, 1, 1.5, 1.5);
		const a5 = rect(1, 1, 2.5, 2.5);
		expect(a1.overlapsRectangle(a1)).toBe(true);
		expect(a1.overlapsRectangle(a2)).toBe(true);
		expect(a1.overlapsRectangle(a3)).toBe(false);
		expect(a4.overlapsRectangle(a2)).toBe(true);
		expect(a5.overlapsRectangle(a2)).toBe(true);

		const b1 = rect(0, 160, 2, -160);
		expect(b1.overlapsRectangle(rect(0, 161, 2, -160))).toBe(true);
		expect(b1.overlapsRectangle(rect(0, 161, 2, 162))).toBe(true);
		expect(b1.overlapsRectangle(rect(0, 159, 2, -159))).toBe(true);
		expect(b1.overlapsRectangle(rect(0, -159, 2, 159))).toBe(false);
		expect(b1.overlapsRectangle(rect(0, -161, 2, -159))).toBe(true);
		expect(a5.overlapsRectangle(b1)).toBe(false);
	});

	it('tests containment', () => {
		const a1 = rect(1, 1, 1, 1);
		const a2 = rect(0, 0, 2, 2);
		const a3 = rect(0, 0, 0.5, 0.5);
		const a4 = rect(1, 1, 1.5, 1.5);
		const a5 = rect(1, 1, 2.5, 2.5);
		expect(a1.containsPoint(new GeoPoint(1, 0))).toBe(false);
		expect(a1.containsPoint(new GeoPoint(0, 1))).toBe(false);
		expect(a1.containsPoint(new GeoPoint(1, 1))).toBe(true);
		expect(a1.containsRectangle(a1)).toBe(true);
		expect(a2.containsRectangle(a1)).toBe(true);
		expect(a2.containsRectangle(a3)).toBe(true);
		expect(a3.containsRectangle(a2)).toBe(false);
		expect(a3.containsRectangle(a4)).toBe(false);
		expect(a5.containsRectangle(a4)).toBe(true);

		const b1 = rect(0, 160, 2, -160);
		expect(b1.containsRectangle(rect(0, 161, 2, -160))).toBe(true);
		expect(b1.containsRectangle(rect(0, 161, 2, 162))).toBe(true);
		expect(b1.containsRectangle(rect(0, 159, 2, -159))).toBe(false);
		expect(b1.containsRectangle(rect(0, -159, 2, 159))).toBe(false);
		expect(b1.containsRectangle(rect(0, -161, 2, -159))).toBe(false);
		expect(a5.containsRectangle(b1)).toBe(false);
	});

	it('translates across the antimeridian', () => {
		const a1 = rect(0, 0, 2, 2);
		expect(a1.translate(new GeoVector(1, 1)).toString()).toBe('[(1, 1) - (3, 3)]');
		expect(a1.translate(new GeoVector(0, -181)).toString()).toBe('[(0, 179) - (2, -179)]');
		expect(a1.translate(new GeoVector(0, 181)).toString()).toBe('[(0, -179) - (2, -177)]');
	});

	it('translates elevation where present', () => {
		const a1 = new GeoRectangle(new GeoPoint(0, 0, 5), new GeoPoint(2, 2));
		const up = a1.translate(new GeoVector(1, 1, 10));
		expect(up.southWest.toString()).toBe('(1, 1, 15m)');
		expect(up.northEast.toString()).toBe('(3, 3)');
		expect(a1.translate(new GeoVector(1, 1, -10)).southWest.elevationMeters).toBe(-5);
	});

	it('moves its south-west corner to an origin', () => {
		const a1 = rect(0, 0, 2, 2);
		expect(a1.moveTo(new GeoPoint(10, 10)).toString()).toBe('[(10, 10) - (12, 12)]');
		expect(a1.moveTo(new GeoPoint(10, 179)).toString()).toBe('[(10, 179) - (12, -179)]');
		expect(a1.moveTo(new GeoPoint(10, -179)).toString()).toBe('[(10, -179) - (12, -177)]');
	});

	it('grows to include another rectangle', () => {
		const a1 = rect(0, 0, 1, 1);
		expect(a1.grow(rect(1, 1, 2, 2)).toString()).toBe('[(0, 0) - (2, 2)]');
		expect(a1.grow(rect(1, 1, 3, 3)).toString()).toBe('[(0, 0) - (3, 3)]');
		expect(a1.grow(rect(-1, -1, 4, 4)).toString()).toBe('[(-1, -1) - (4, 4)]');
		expect(a1.grow(rect(0.2, 0.3, 0.4, 0.5)).toString()).toBe('[(0, 0) - (1, 1)]');
		expect(a1.grow(rect(-1, 0, 0.3, 0.5)).toString()).toBe('[(-1, 0) - (1, 1)]');
		expect(a1.grow(rect(0.5, 0.5, 3, 4)).toString()).toBe('[(0, 0) - (3, 4)]');
	});

	it('grows the short way around the globe', () => {
		const a1 = rect(0, 150, 2, 160);
		const a2 = rect(0, -160, 2, -150);
		const a3 = rect(0, 160, 2, -160);
		expect(a1.grow(new GeoPoint(1, 170)).toString()).toBe('[(0, 150) - (2, 170)]');
		expect(a1.grow(new GeoPoint(1, -170)).toString()).toBe('[(0, 150) - (2, -170)]');
		expect(a2.grow(new GeoPoint(1, 170)).toString()).toBe('[(0, 170) - (2, -150)]');
		expect(a2.grow(new GeoPoint(1, -170)).toString()).toBe('[(0, -170) - (2, -150)]');
		expect(a3.grow(new GeoPoint(1, 170)).toString()).toBe('[(0, 160) - (2, -160)]');
		expect(a3.grow(new GeoPoint(1, -170)).toString()).toBe('[(0, 160) - (2, -160)]');
		expect(a3.grow(new GeoPoint(1, 150)).toString()).toBe('[(0, 150) - (2, -160)]');
		expect(a3.grow(new GeoPoint(1, -150)).toString()).toBe('[(0, 160) - (2, -150)]');
	});

	it('grows to points inside and outside', () => {
		const plain = rect(0, 150, 2, 160);
		expect(plain.grow(new GeoPoint(1, 151)).toString()).toBe('[(0, 150) - (2, 160)]');
		expect(plain.grow(new GeoPoint(-1, 151)).toString()).toBe('[(-1, 150) - (2, 160)]');
		expect(plain.grow(new GeoPoint(0, 149)).toString()).toBe('[(0, 149) - (2, 160)]');
		expect(plain.grow(new GeoPoint(1, 161)).toString()).toBe('[(0, 150) - (2, 161)]');
		expect(plain.grow(new GeoPoint(3, 159)).toString()).toBe('[(0, 150) - (3, 160)]');

		const wrapped = rect(0, 160, 2, -160);
		expect(wrapped.grow(new GeoPoint(1, 161)).toString()).toBe('[(0, 160) - (2, -160)]');
		expect(wrapped.grow(new GeoPoint(1, -161)).toString()).toBe('[(0, 160) - (2, -160)]');
		expect(wrapped.grow(new GeoPoint(1, 159)).toString()).toBe('[(0, 159) - (2, -160)]');
		expect(wrapped.grow(new GeoPoint(-1, 161)).toString()).toBe('[(-1, 160) - (2, -160)]');
		expect(wrapped.grow(new GeoPoint(1, -159)).toString()).toBe('[(0, 160) - (2, -159)]');
		expect(wrapped.grow(new GeoPoint(3, -161)).toString()).toBe('[(0, 160) - (3, -160)]');
	});

	it('starts from a point when there is nothing to grow', () => {
		const point = new GeoPoint(1, 2);
		expect(GeoRectangle.growToPoint(null, point).toString()).toBe('[(1, 2) - (1, 2)]');
		expect(GeoRectangle.growToPoint(rect(0, 0, 1, 1), point).toString()).toBe('[(0, 0) - (1, 2)]');
	});

	it('expands by meters on every side', () => {
		const expanded = rect(0, 0, 1, 1).expand(1000);
		expect(expanded.southWest.lat).toBe(-metersToDegreesLat(1000));
		expect(expanded.southWest.lon).toBeCloseTo(-metersToDegreesLonAtLat(1000, 0), 10);
		expect(expanded.northEast.lat).toBe(1 + metersToDegreesLat(1000));
		expect(expanded.northEast.lon).toBeCloseTo(1 + metersToDegreesLonAtLat(1000, 1), 10);
		expect(rect(89.999, 0, 90, 1).expand(1000).northEast.lat).toBe(90);
	});

	it('compares by value', () => {
		expect(rect(0, 0, 1, 1).isEqual(rect(1, 0, 0, 1))).toBe(true);
		expect(rect(0, 0, 1, 1).isEqual(rect(0, 0, 1, 2))).toBe(false);
		expect(rect(0, 0, 1, 1).hashCode()).toBe(rect(0, 0, 1, 1).hashCode());
	});
});
