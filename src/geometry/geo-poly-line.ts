import { GeoArgumentError } from './errors.js';
import { GeoLine } from './geo-line.js';
import { GeoPoint } from './geo-point.js';
import { GeoVector } from './geo-vector.js';
import { hashCodeOf } from './hash-code.js';

export class GeoPolyLine {
	readonly points: readonly GeoPoint[];

	constructor(points: readonly GeoPoint[]) {
		if (points.length < 2) {
			throw new GeoArgumentError(`GeoPolyLine needs at least 2 points, got ${points.length}.`, {
				argument: 'points',
				value: points
			});
		}
		this.points = [...points];
	}

	get size(): number {
		return this.points.length;
	}

	get origin(): GeoPoint {
		return this.get(0);
	}

	get center(): GeoPoint {
		let southWest = this.get(0);
		let northEast = this.get(0);
		for (const point of this.points) {
			if (new GeoLine(southWest, point).isWrappedOnLongSide()) {
				southWest = southWest.withLon(point.lon);
			} else if (!new GeoLine(northEast, point).isWrappedOnLongSide()) {
				northEast = northEast.withLon(point.lon);
			}
			if (point.lat < southWest.lat) {
				southWest = southWest.withLat(point.lat);
			} else if (point.lat > northEast.lat) {
				northEast = northEast.withLat(point.lat);
			}
		}
		return new GeoPoint((southWest.lat + northEast.lat) / 2.0, (southWest.lon + northEast.lon) / 2.0);
	}

	get lengthMeters(): number {
		return this.asLines().reduce((total, line) => total + line.lengthMeters, 0.0);
	}

	get(index: number): GeoPoint {
		const point = this.points[index];
		if (!Number.isInteger(index) || !point) {
			throw new GeoArgumentError(`Point index ${index} is out of range [0, ${this.points.length - 1}].`, {
				argument: 'index',
				value: index
			});
		}
		return point;
	}

	getLine(index: number): GeoLine {
		if (index > this.points.length - 2) {
			throw new GeoArgumentError(`Line index ${index} is out of range [0, ${this.points.length - 2}].`, {
				argument: 'index',
				value: index
			});
		}
		return new GeoLine(this.get(index), this.get(index + 1));
	}

	asLines(): GeoLine[] {
		const lines: GeoLine[] = [];
		for (let i = 1; i < this.points.length; i += 1) {
			lines.push(new GeoLine(this.get(i - 1), this.get(i)));
		}
		return lines;
	}

	translate(vector: GeoVector): GeoPolyLine {
		return new GeoPolyLine(this.points.map((point) => point.translate(vector)));
	}

	moveTo(origin: GeoPoint): GeoPolyLine {
		const first = this.get(0);
		const line = new GeoLine(first, origin);
		const northing = line.northing * (origin.lat >= first.lat ? 1 : -1);
		return this.translate(new GeoVector(northing, line.easting));
	}

	isEqual(other: GeoPolyLine): boolean {
		if (this.points.length !== other.points.length) {
			return false;
		}
		return this.points.every((point, i) => {
			const that = other.points[i];
			return that !== undefined && point.isEqual(that);
		});
	}

	hashCode(): number {
		return hashCodeOf(...this.points);
	}
}
