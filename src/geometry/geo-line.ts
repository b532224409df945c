import { distanceInMeters } from './geo.js';
import { GeoPoint } from './geo-point.js';
import { GeoVector } from './geo-vector.js';
import { hashCodeOf } from './hash-code.js';

/**
 * Swaps latitudes (never longitudes) so that the first corner is south of the second. The
 * longitude order is kept: west-to-east may cross the antimeridian.
 */
export function orderCorners(southWest: GeoPoint, northEast: GeoPoint): [GeoPoint, GeoPoint] {
	if (southWest.lat <= northEast.lat) {
		return [southWest, northEast];
	}
	return [southWest.withLat(northEast.lat), northEast.withLat(southWest.lat)];
}

/** Eastward span from `west` to `east` in [0, 360). */
export function eastingBetween(west: number, east: number): number {
	return east >= west ? east - west : 360.0 + (east - west);
}

export class GeoLine {
	readonly southWest: GeoPoint;
	readonly northEast: GeoPoint;

	constructor(southWest: GeoPoint, northEast: GeoPoint) {
		const [lowerLeft, upperRight] = orderCorners(southWest, northEast);
		this.southWest = lowerLeft;
		this.northEast = upperRight;
	}

	static shortestLine(from: GeoPoint, to: GeoPoint): GeoLine {
		const line = new GeoLine(from, to);
		return line.isWrappedOnLongSide() ? new GeoLine(to, from) : line;
	}

	get origin(): GeoPoint {
		return this.southWest;
	}

	get center(): GeoPoint {
		const lat = (this.southWest.lat + this.northEast.lat) / 2.0;
		const east = this.northEast.lon >= this.southWest.lon ? this.northEast.lon : this.northEast.lon + 360.0;
		return new GeoPoint(lat, (east + this.southWest.lon) / 2.0);
	}

	get northing(): number {
		return this.northEast.lat - this.southWest.lat;
	}

	get easting(): number {
		return eastingBetween(this.southWest.lon, this.northEast.lon);
	}

	get lengthMeters(): number {
		return distanceInMeters(this.southWest, this.northEast);
	}

	isWrappedOnLongSide(): boolean {
		return this.easting >= 180.0;
	}

	withSouthWest(southWest: GeoPoint): GeoLine {
		return new GeoLine(southWest, this.northEast);
	}

	withNorthEast(northEast: GeoPoint): GeoLine {
		return new GeoLine(this.southWest, northEast);
	}

	translate(vector: GeoVector): GeoLine {
		return new GeoLine(this.southWest.translate(vector), this.northEast.translate(vector));
	}

	moveTo(origin: GeoPoint): GeoLine {
		return new GeoLine(origin, origin.translate(new GeoVector(this.northing, this.easting)));
	}

	isEqual(other: GeoLine): boolean {
		return this.southWest.isEqual(other.southWest) && this.northEast.isEqual(other.northEast);
	}

	hashCode(): number {
		return hashCodeOf(this.southWest, this.northEast);
	}
}
