import { GeoArgumentError, requireFinite } from './errors.js';
import { degreesLatToMeters, degreesLonToMetersAtLat, mapToLat, metersToDegreesLat, metersToDegreesLonAtLat } from './geo.js';
import { GeoPoint } from './geo-point.js';
import { GeoRectangle } from './geo-rectangle.js';
import type { GeoVector } from './geo-vector.js';
import { hashCodeOf } from './hash-code.js';

const COS_45 = 0.707106781186548;

export class GeoCircle {
	readonly kind = 'circle' as const;
	readonly center: GeoPoint;
	readonly radiusMeters: number;

	constructor(center: GeoPoint, radiusMeters: number) {
		if (requireFinite('radiusMeters', radiusMeters) < 0) {
			throw new GeoArgumentError(`radiusMeters must be >= 0, got ${radiusMeters}.`, {
				argument: 'radiusMeters',
				value: radiusMeters
			});
		}
		this.center = center;
		this.radiusMeters = radiusMeters;
	}

	/** Circle around `center` passing through `point`. */
	static throughPoint(center: GeoPoint, point: GeoPoint): GeoCircle {
		const lat = Math.abs(center.lat - point.lat);
		const lon = Math.abs(center.lon - point.lon);
		const w = degreesLatToMeters(lat);
		const h = degreesLonToMetersAtLat(lon, (center.lat + point.lat) / 2.0);
		return new GeoCircle(center, Math.sqrt(w * w + h * h));
	}

	get origin(): GeoPoint {
		return this.boundingBox().southWest;
	}

	withCenter(center: GeoPoint): GeoCircle {
		return new GeoCircle(center, this.radiusMeters);
	}

	withRadiusMeters(radiusMeters: number): GeoCircle {
		return new GeoCircle(this.center, radiusMeters);
	}

	boundingBox(): GeoRectangle {
		return this.scaledBox(1.0);
	}

	/** Largest axis-aligned rectangle inside the circle. */
	innerBoundingBox(): GeoRectangle {
		return this.scaledBox(COS_45);
	}

	translate(vector: GeoVector): GeoCircle {
		return new GeoCircle(this.center.translate(vector), this.radiusMeters);
	}

	moveTo(origin: GeoPoint): GeoCircle {
		return new GeoCircle(origin, this.radiusMeters);
	}

	isEqual(other: GeoCircle): boolean {
		return this.center.isEqual(other.center) && this.radiusMeters === other.radiusMeters;
	}

	hashCode(): number {
		return hashCodeOf(this.kind, this.center, this.radiusMeters);
	}

	private scaledBox(factor: number): GeoRectangle {
		const { lat, lon } = this.center;
		const latDelta = metersToDegreesLat(this.radiusMeters) * factor;
		const lonDelta = metersToDegreesLonAtLat(this.radiusMeters, lat) * factor;
		return new GeoRectangle(
			new GeoPoint(mapToLat(lat - latDelta), lon - lonDelta),
			new GeoPoint(mapToLat(lat + latDelta), lon + lonDelta)
		);
	}
}
