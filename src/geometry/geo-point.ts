import { GeoArgumentError, requireFinite, requireInRange } from './errors.js';
import { mapToLat, mapToLon, metersToDegreesLat, metersToDegreesLonAtLat } from './geo.js';
import { GeoVector } from './geo-vector.js';
import { hashCodeOf } from './hash-code.js';

function normalizeElevation(elevationMeters: number | null | undefined): number | null {
	if (elevationMeters === null || elevationMeters === undefined || Number.isNaN(elevationMeters)) {
		return null;
	}
	if (!Number.isFinite(elevationMeters)) {
		throw new GeoArgumentError(`elevationMeters must be finite, got ${elevationMeters}.`, {
			argument: 'elevationMeters',
			value: elevationMeters
		});
	}
	return elevationMeters;
}

export class GeoPoint {
	readonly lat: number;
	readonly lon: number;
	/** `null` when absent, which is not the same as 0. */
	readonly elevationMeters: number | null;

	constructor(lat: number, lon: number, elevationMeters?: number | null) {
		this.lat = requireInRange('lat', lat, -90.0, 90.0);
		this.lon = mapToLon(requireFinite('lon', lon));
		this.elevationMeters = normalizeElevation(elevationMeters);
	}

	get origin(): GeoPoint {
		return this;
	}

	get center(): GeoPoint {
		return this;
	}

	withLat(lat: number): GeoPoint {
		return new GeoPoint(lat, this.lon, this.elevationMeters);
	}

	withLon(lon: number): GeoPoint {
		return new GeoPoint(this.lat, lon, this.elevationMeters);
	}

	withElevationMeters(elevationMeters: number | null): GeoPoint {
		return new GeoPoint(this.lat, this.lon, elevationMeters);
	}

	translate(vector: GeoVector): GeoPoint {
		const lat = mapToLat(this.lat + vector.northing);
		let lon = this.lon + vector.easting;
		if (lon < -180.0) {
			lon += 360.0;
		} else if (lon >= 180.0) {
			lon -= 360.0;
		}
		const elevationMeters =
			this.elevationMeters === null ? null : this.elevationMeters + vector.elevationMeters;
		return new GeoPoint(lat, lon, elevationMeters);
	}

	/** Translates by a distance in meters, scaling longitude at this point's latitude. */
	translateMeters(northingMeters: number, eastingMeters: number, elevationMeters = 0.0): GeoPoint {
		return this.translate(metersToVector(this, northingMeters, eastingMeters, elevationMeters));
	}

	moveTo(origin: GeoPoint): GeoPoint {
		return origin;
	}

	isEqual(other: GeoPoint): boolean {
		return (
			this.lat === other.lat &&
			this.lon === other.lon &&
			this.elevationMeters === other.elevationMeters
		);
	}

	hashCode(): number {
		return hashCodeOf(this.lat, this.lon, this.elevationMeters);
	}

	toString(): string {
		const elevation = this.elevationMeters === null ? '' : `, ${this.elevationMeters}m`;
		return `(${this.lat}, ${this.lon}${elevation})`;
	}
}

export function metersToVector(
	origin: GeoPoint,
	northingMeters: number,
	eastingMeters: number,
	elevationMeters = 0.0
): GeoVector {
	return new GeoVector(
		metersToDegreesLat(northingMeters),
		metersToDegreesLonAtLat(eastingMeters, origin.lat),
		elevationMeters
	);
}
