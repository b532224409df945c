import { LON180, mapToLat, metersToDegreesLat, metersToDegreesLonAtLat } from './geo.js';
import { eastingBetween, orderCorners } from './geo-line.js';
import { GeoPoint } from './geo-point.js';
import { GeoVector } from './geo-vector.js';
import { hashCodeOf } from './hash-code.js';

/**
 * Axis-aligned area between two corners. When the south-west longitude is east of the
 * north-east longitude the rectangle wraps across the antimeridian.
 */
export class GeoRectangle {
	readonly kind = 'rectangle' as const;
	readonly southWest: GeoPoint;
	readonly northEast: GeoPoint;

	constructor(southWest: GeoPoint, northEast: GeoPoint) {
		const [lowerLeft, upperRight] = orderCorners(southWest, northEast);
		this.southWest = lowerLeft;
		this.northEast = upperRight;
	}

	static world(): GeoRectangle {
		return new GeoRectangle(new GeoPoint(-90.0, -180.0), new GeoPoint(90.0, LON180));
	}

	/** Degenerate rectangle covering a single point. */
	static ofPoint(point: GeoPoint): GeoRectangle {
		return new GeoRectangle(point, point);
	}

	static growToPoint(rectangle: GeoRectangle | null, point: GeoPoint): GeoRectangle {
		return rectangle === null ? GeoRectangle.ofPoint(point) : rectangle.grow(point);
	}

	get origin(): GeoPoint {
		return this.southWest;
	}

	get center(): GeoPoint {
		const lat = (this.southWest.lat + this.northEast.lat) / 2.0;
		const lon = this.southWest.lon + this.easting / 2.0;
		const { elevationMeters: south } = this.southWest;
		const { elevationMeters: north } = this.northEast;
		return new GeoPoint(lat, lon, south === null || north === null ? null : (south + north) / 2.0);
	}

	get northing(): number {
		return this.northEast.lat - this.southWest.lat;
	}

	get easting(): number {
		return eastingBetween(this.southWest.lon, this.northEast.lon);
	}

	/** Surface in square degrees. */
	get surface(): number {
		return this.northing * this.easting;
	}

	isWrapped(): boolean {
		return this.southWest.lon > this.northEast.lon;
	}

	/** Non-wrapped parts: the rectangle itself, or its west and east halves. */
	split(): GeoRectangle[] {
		if (!this.isWrapped()) {
			return [this];
		}
		return [
			new GeoRectangle(new GeoPoint(this.southWest.lat, -180.0), this.northEast),
			new GeoRectangle(this.southWest, new GeoPoint(this.northEast.lat, LON180))
		];
	}

	withSouthWest(southWest: GeoPoint): GeoRectangle {
		return new GeoRectangle(southWest, this.northEast);
	}

	withNorthEast(northEast: GeoPoint): GeoRectangle {
		return new GeoRectangle(this.southWest, northEast);
	}

	overlapsRectangle(other: GeoRectangle): boolean {
		const others = other.split();
		return this.split().some((part) => others.some((that) => cellsOverlap(part, that)));
	}

	containsRectangle(other: GeoRectangle): boolean {
		const parts = this.split();
		return other.split().every((that) => parts.some((part) => cellContains(part, that)));
	}

	containsPoint(point: GeoPoint): boolean {
		return this.containsRectangle(GeoRectangle.ofPoint(point));
	}

	/** Grows the rectangle by `meters` on every side. */
	expand(meters: number): GeoRectangle {
		const latDelta = metersToDegreesLat(meters);
		const southLonDelta = metersToDegreesLonAtLat(meters, this.southWest.lat);
		const northLonDelta = metersToDegreesLonAtLat(meters, this.northEast.lat);
		return new GeoRectangle(
			new GeoPoint(mapToLat(this.southWest.lat - latDelta), this.southWest.lon - southLonDelta),
			new GeoPoint(mapToLat(this.northEast.lat + latDelta), this.northEast.lon + northLonDelta)
		);
	}

	/**
	 * Smallest extension of this rectangle that includes `other`. Longitude may be extended either
	 * way around the globe; the narrowest candidate that actually grows the span wins.
	 */
	grow(other: GeoPoint | GeoRectangle): GeoRectangle {
		if (other instanceof GeoRectangle) {
			return this.grow(other.southWest).grow(other.northEast);
		}
		const southLat = Math.min(this.southWest.lat, other.lat);
		const northLat = Math.max(this.northEast.lat, other.lat);
		const west = this.southWest.lon;
		const east = this.northEast.lon;

		let west1: number;
		let east1: number;
		let west2: number;
		let east2: number;
		if (this.isWrapped()) {
			west1 = Math.min(west, other.lon);
			east1 = Math.min(east, other.lon);
			west2 = Math.max(west, other.lon);
			east2 = Math.max(east, other.lon);
		} else {
			west1 = Math.min(west, other.lon);
			east1 = Math.max(east, other.lon);
			west2 = Math.max(west, other.lon);
			east2 = Math.min(east, other.lon);
		}

		const rect1 = new GeoRectangle(new GeoPoint(southLat, west1), new GeoPoint(northLat, east1));
		const rect2 = new GeoRectangle(new GeoPoint(southLat, west2), new GeoPoint(northLat, east2));
		const latOnly = new GeoRectangle(this.southWest.withLat(southLat), this.northEast.withLat(northLat));

		const narrowest = rect1.easting <= rect2.easting ? rect1 : rect2;
		return narrowest.easting > this.easting ? narrowest : latOnly;
	}

	translate(vector: GeoVector): GeoRectangle {
		return new GeoRectangle(this.southWest.translate(vector), this.northEast.translate(vector));
	}

	moveTo(origin: GeoPoint): GeoRectangle {
		return new GeoRectangle(origin, origin.translate(new GeoVector(this.northing, this.easting)));
	}

	isEqual(other: GeoRectangle): boolean {
		return this.southWest.isEqual(other.southWest) && this.northEast.isEqual(other.northEast);
	}

	hashCode(): number {
		return hashCodeOf(this.kind, this.southWest, this.northEast);
	}

	toString(): string {
		return `[${this.southWest.toString()} - ${this.northEast.toString()}]`;
	}
}

// The helpers below take non-wrapped rectangles only.

export function cellsOverlap(a: GeoRectangle, b: GeoRectangle): boolean {
	return !(
		a.southWest.lat > b.northEast.lat ||
		a.northEast.lat < b.southWest.lat ||
		a.southWest.lon > b.northEast.lon ||
		a.northEast.lon < b.southWest.lon
	);
}

export function cellContains(outer: GeoRectangle, inner: GeoRectangle): boolean {
	return (
		outer.southWest.lat <= inner.southWest.lat &&
		outer.northEast.lat >= inner.northEast.lat &&
		outer.southWest.lon <= inner.southWest.lon &&
		outer.northEast.lon >= inner.northEast.lon
	);
}
