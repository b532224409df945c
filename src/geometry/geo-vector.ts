import { requireFinite, requireInRange } from './errors.js';
import { hashCodeOf } from './hash-code.js';

/** A translation in degrees (and meters for elevation); not a position. */
export class GeoVector {
	readonly northing: number;
	readonly easting: number;
	readonly elevationMeters: number;

	constructor(northing: number, easting: number, elevationMeters = 0.0) {
		this.northing = requireInRange('northing', northing, -180.0, 180.0);
		this.easting = requireInRange('easting', easting, -360.0, 360.0);
		this.elevationMeters = requireFinite('elevationMeters', elevationMeters);
	}

	isEqual(other: GeoVector): boolean {
		return (
			this.northing === other.northing &&
			this.easting === other.easting &&
			this.elevationMeters === other.elevationMeters
		);
	}

	hashCode(): number {
		return hashCodeOf(this.northing, this.easting, this.elevationMeters);
	}
}
