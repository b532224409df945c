import { describe, expect, it } from 'vitest';

import { Duration } from '../src/geometry/duration.js';
import { GeoArgumentError } from '../src/geometry/errors.js';
import {
	LON180,
	METERS_PER_DEGREE_LAT,
	METERS_PER_DEGREE_LON_EQUATOR,
	degreesLatToMeters,
	degreesLonToMetersAtLat,
	distanceInMeters,
	estimatedMinTravelTime,
	mapToLat,
	mapToLon,
	metersToDegreesLat,
	metersToDegreesLonAtLat
} from '../src/geometry/geo.js';
import { GeoPoint } from '../src/geometry/geo-point.js';

describe('degree and meter conversions', () => {
	it('converts latitude degrees independently of position', () => {
		expect(degreesLatToMeters(0)).toBe(0);
		expect(degreesLatToMeters(0.5)).toBe(METERS_PER_DEGREE_LAT / 2.0);
		expect(degreesLatToMeters(-90)).toBe(-METERS_PER_DEGREE_LAT * 90);
		expect(metersToDegreesLat(METERS_PER_DEGREE_LAT)).toBe(1);
		expect(metersToDegreesLat(METERS_PER_DEGREE_LAT * 90)).toBe(90);
	});

	it('scales longitude by the cosine of the latitude', () => {
		expect(degreesLonToMetersAtLat(1, 0)).toBe(METERS_PER_DEGREE_LON_EQUATOR);
		expect(degreesLonToMetersAtLat(1, 60)).toBeCloseTo(METERS_PER_DEGREE_LON_EQUATOR / 2.0, 6);
		expect(degreesLonToMetersAtLat(1, -60)).toBeCloseTo(METERS_PER_DEGREE_LON_EQUATOR / 2.0, 6);
		expect(metersToDegreesLonAtLat(METERS_PER_DEGREE_LON_EQUATOR, 0)).toBe(1);
		expect(metersToDegreesLonAtLat(METERS_PER_DEGREE_LON_EQUATOR, 60)).toBeCloseTo(2.0, 6);
	});
});

describe('mapToLat', () => {
	it('clamps to the poles', () => {
		expect(mapToLat(-1)).toBe(-1);
		expect(mapToLat(90)).toBe(90);
		expect(mapToLat(100)).toBe(90);
		expect(mapToLat(-100)).toBe(-90);
	});
});

describe('mapToLon', () => {
	it('wraps into [-180, 180)', () => {
		expect(mapToLon(0)).toBe(0);
		expect(mapToLon(-1)).toBe(-1);
		expect(mapToLon(-180)).toBe(-180);
		expect(mapToLon(180)).toBe(-180);
		expect(mapToLon(LON180)).toBeCloseTo(LON180, 6);
		expect(mapToLon(200)).toBe(-160);
		expect(mapToLon(-200)).toBe(160);
		expect(Math.abs(mapToLon(360))).toBe(0);
		expect(Math.abs(mapToLon(-360))).toBe(0);
	});
});

describe('distanceInMeters', () => {
	it('measures latitude and longitude spans', () => {
		expect(distanceInMeters(new GeoPoint(-0.5, 0), new GeoPoint(0.5, 0))).toBe(METERS_PER_DEGREE_LAT);
		expect(distanceInMeters(new GeoPoint(80, 0), new GeoPoint(81, 0))).toBeCloseTo(METERS_PER_DEGREE_LAT, 6);
		expect(distanceInMeters(new GeoPoint(0, -0.5), new GeoPoint(0, 0.5))).toBe(METERS_PER_DEGREE_LON_EQUATOR);
		expect(distanceInMeters(new GeoPoint(60, 80), new GeoPoint(60, 81))).toBeCloseTo(
			METERS_PER_DEGREE_LON_EQUATOR / 2.0,
			6
		);
	});

	it('takes the shorter way around the antimeridian', () => {
		const east = new GeoPoint(10, 170);
		const west = new GeoPoint(10, -170);
		expect(distanceInMeters(east, west)).toBeCloseTo(degreesLonToMetersAtLat(20, 10), 6);
		expect(distanceInMeters(west, east)).toBeCloseTo(distanceInMeters(east, west), 6);
	});

	it('is symmetric', () => {
		const points = [
			new GeoPoint(0, 0),
			new GeoPoint(52.3765, 4.908),
			new GeoPoint(-33.9, 151.2),
			new GeoPoint(64.1, -21.9),
			new GeoPoint(-10, -179.5),
			new GeoPoint(89, 179)
		];
		for (const p1 of points) {
			for (const p2 of points) {
				expect(distanceInMeters(p1, p2)).toBeCloseTo(distanceInMeters(p2, p1), 6);
			}
		}
	});

	it('includes the elevation delta only when both elevations are present', () => {
		expect(distanceInMeters(new GeoPoint(0, 0, 0), new GeoPoint(0, 0, 2))).toBe(2);
		expect(distanceInMeters(new GeoPoint(0, 0), new GeoPoint(0, 0, 2))).toBe(0);
		expect(distanceInMeters(new GeoPoint(-0.5, -0.5, 0), new GeoPoint(0.5, 0.5, 2))).toBeCloseTo(
			Math.sqrt(METERS_PER_DEGREE_LAT ** 2 + METERS_PER_DEGREE_LON_EQUATOR ** 2 + 4),
			6
		);
	});
});

describe('estimatedMinTravelTime', () => {
	const from = new GeoPoint(0, 0);
	const east = (meters: number) => from.translateMeters(0, meters);

	it('accumulates time over the speed bands', () => {
		expect(estimatedMinTravelTime(from, from).seconds).toBe(0);
		expect(estimatedMinTravelTime(from, east(500)).seconds).toBe(120);
		expect(estimatedMinTravelTime(from, east(1000)).seconds).toBe(240);
		expect(estimatedMinTravelTime(from, east(1200)).seconds).toBe(276);
		expect(estimatedMinTravelTime(from, east(1500)).seconds).toBe(330);
		expect(estimatedMinTravelTime(from, east(2000)).seconds).toBe(420);
		expect(estimatedMinTravelTime(from, east(2500)).seconds).toBe(480);
		expect(estimatedMinTravelTime(from, east(99000)).seconds).toBe(6007);
		expect(estimatedMinTravelTime(from, east(100000)).seconds).toBe(6059);
		expect(estimatedMinTravelTime(from, east(150000)).seconds).toBe(8059);
	});

	it('rounds the distance first', () => {
		const to = east(1234);
		expect(estimatedMinTravelTime(from, to).seconds).toBe(282);
		expect(estimatedMinTravelTime(from, to, { roundToMeters: 0 }).seconds).toBe(282);
		expect(estimatedMinTravelTime(from, to, { roundToMeters: 100 }).seconds).toBe(276);
		expect(estimatedMinTravelTime(from, to, { roundToMeters: 1000 }).seconds).toBe(240);
	});

	it('accepts a custom speed table', () => {
		const speedTable = [
			{ fromKm: 0, kmPerHour: 36 },
			{ fromKm: 1, kmPerHour: 72 }
		];
		// 1000 m at 10 m/s plus 1000 m at 20 m/s.
		expect(estimatedMinTravelTime(from, east(2000), { speedTable }).isEqual(Duration.ofSeconds(150))).toBe(true);
	});

	it('rejects invalid options', () => {
		expect(() => estimatedMinTravelTime(from, from, { roundToMeters: -1 })).toThrow(GeoArgumentError);
		expect(() => estimatedMinTravelTime(from, from, { roundToMeters: 1.5 })).toThrow(GeoArgumentError);
		expect(() => estimatedMinTravelTime(from, from, { speedTable: [] })).toThrow(
			'speedTable must start with a band from 0 km.'
		);
		expect(() =>
			estimatedMinTravelTime(from, from, {
				speedTable: [
					{ fromKm: 0, kmPerHour: 10 },
					{ fromKm: 0, kmPerHour: 20 }
				]
			})
		).toThrow('speedTable bands must be in ascending order.');
		expect(() => estimatedMinTravelTime(from, from, { speedTable: [{ fromKm: 0, kmPerHour: 0 }] })).toThrow(
			'speedTable[0] must have a positive speed.'
		);
	});
});
