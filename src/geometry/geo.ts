import { Duration } from './duration.js';
import { GeoArgumentError } from './errors.js';
import type { GeoPoint } from './geo-point.js';

// WGS84 radii.
export const EARTH_RADIUS_X_METERS = 6378137.0;
export const EARTH_RADIUS_Y_METERS = 6356752.3142;

export const EARTH_CIRCUMFERENCE_X = EARTH_RADIUS_X_METERS * 2.0 * Math.PI;
export const EARTH_CIRCUMFERENCE_Y = EARTH_RADIUS_Y_METERS * 2.0 * Math.PI;

// Meters per degree longitude must be scaled by cos(lat).
export const METERS_PER_DEGREE_LAT = EARTH_CIRCUMFERENCE_Y / 360.0;
export const METERS_PER_DEGREE_LON_EQUATOR = EARTH_CIRCUMFERENCE_X / 360.0;

/** Largest longitude short of 180, which wraps to -180. */
export const LON180 = 179.999999999999;

function toRadians(degrees: number): number {
	return (degrees * Math.PI) / 180.0;
}

export function degreesLatToMeters(latDegrees: number): number {
	return latDegrees * METERS_PER_DEGREE_LAT;
}

export function metersToDegreesLat(northMeters: number): number {
	return northMeters / METERS_PER_DEGREE_LAT;
}

export function degreesLonToMetersAtLat(lonDegrees: number, lat: number): number {
	return lonDegrees * METERS_PER_DEGREE_LON_EQUATOR * Math.cos(toRadians(lat));
}

/**
 * Converts an eastward distance to degrees longitude at the given latitude. The result grows
 * without bound towards the poles.
 */
export function metersToDegreesLonAtLat(eastMeters: number, lat: number): number {
	return eastMeters / METERS_PER_DEGREE_LON_EQUATOR / Math.cos(toRadians(lat));
}

/** Clamps a latitude to [-90, 90]. */
export function mapToLat(lat: number): number {
	return Math.min(90.0, Math.max(-90.0, lat));
}

/** Wraps any longitude into [-180, 180). */
export function mapToLon(value: number): number {
	// The fold below is not exact, so canonical values pass through untouched.
	if (value >= -180.0 && value < 180.0) {
		return value;
	}
	const sign = value >= 0 ? 1.0 : -1.0;
	const lon = (((Math.abs(value) + 180.0) % 360.0) - 180.0) * sign;
	return lon === 180.0 ? -180.0 : lon;
}

/**
 * Estimated distance between two points over a flat Earth, using the shortest longitude span
 * and the latitude midpoint to scale longitude. Missing elevations count as equal.
 */
export function distanceInMeters(p1: GeoPoint, p2: GeoPoint): number {
	let deltaLon = p1.lon > p2.lon ? 360.0 - (p1.lon - p2.lon) : p2.lon - p1.lon;
	if (deltaLon > 180.0) {
		deltaLon = 360.0 - deltaLon;
	}
	const deltaLat = Math.abs(p1.lat - p2.lat);
	const midLat = p1.lat + (p2.lat - p1.lat) / 2.0;

	const deltaX = degreesLonToMetersAtLat(deltaLon, midLat);
	const deltaY = degreesLatToMeters(deltaLat);
	const deltaZ =
		p1.elevationMeters === null || p2.elevationMeters === null
			? 0.0
			: p1.elevationMeters - p2.elevationMeters;
	return Math.sqrt(deltaX * deltaX + deltaY * deltaY + deltaZ * deltaZ);
}

export type SpeedBand = {
	fromKm: number;
	kmPerHour: number;
};

export const CROW_FLIGHT_SPEED_TABLE: readonly SpeedBand[] = [
	{ fromKm: 0, kmPerHour: 15 },
	{ fromKm: 1, kmPerHour: 20 },
	{ fromKm: 2, kmPerHour: 30 },
	{ fromKm: 3, kmPerHour: 35 },
	{ fromKm: 4, kmPerHour: 40 },
	{ fromKm: 6, kmPerHour: 45 },
	{ fromKm: 10, kmPerHour: 50 },
	{ fromKm: 15, kmPerHour: 60 },
	{ fromKm: 25, kmPerHour: 65 },
	{ fromKm: 50, kmPerHour: 70 },
	{ fromKm: 100, kmPerHour: 90 }
];

export type TravelTimeOptions = {
	roundToMeters?: number;
	speedTable?: readonly SpeedBand[];
};

function validateSpeedTable(table: readonly SpeedBand[]): void {
	if (table.length === 0 || table[0]?.fromKm !== 0) {
		throw new GeoArgumentError('speedTable must start with a band from 0 km.', {
			argument: 'speedTable',
			value: table
		});
	}
	table.forEach((band, index) => {
		if (!(band.kmPerHour > 0) || !Number.isFinite(band.kmPerHour)) {
			throw new GeoArgumentError(`speedTable[${index}] must have a positive speed.`, {
				argument: 'speedTable',
				value: band
			});
		}
		const previous = index > 0 ? table[index - 1] : undefined;
		if (previous && !(band.fromKm > previous.fromKm)) {
			throw new GeoArgumentError('speedTable bands must be in ascending order.', {
				argument: 'speedTable',
				value: band
			});
		}
	});
}

/**
 * Lower bound for travelling between two points, assuming the crow-flight speed increases with
 * distance. The distance is first rounded to the nearest multiple of `roundToMeters`.
 */
export function estimatedMinTravelTime(
	from: GeoPoint,
	to: GeoPoint,
	options: TravelTimeOptions = {}
): Duration {
	const roundToMeters = options.roundToMeters ?? 1;
	if (!Number.isInteger(roundToMeters) || roundToMeters < 0) {
		throw new GeoArgumentError(`roundToMeters must be an integer >= 0, got ${roundToMeters}.`, {
			argument: 'roundToMeters',
			value: roundToMeters
		});
	}
	const table = options.speedTable ?? CROW_FLIGHT_SPEED_TABLE;
	if (table !== CROW_FLIGHT_SPEED_TABLE) {
		validateSpeedTable(table);
	}

	const unit = roundToMeters === 0 ? 1 : roundToMeters;
	let remaining = Math.round(distanceInMeters(from, to) / unit) * unit;

	let totalSeconds = 0.0;
	for (let i = 0; remaining > 0 && i < table.length; i += 1) {
		const band = table[i];
		if (!band) {
			break;
		}
		const next = table[i + 1];
		const bandMeters = next ? (next.fromKm - band.fromKm) * 1000.0 : Number.POSITIVE_INFINITY;
		const metersPerSecond = (band.kmPerHour * 1000.0) / 3600.0;
		totalSeconds += Math.min(remaining, bandMeters) / metersPerSecond;
		remaining -= bandMeters;
	}
	return Duration.ofSeconds(totalSeconds);
}
