import { GeoArgumentError } from '../geometry/errors.js';
import type { GeoPoint } from '../geometry/geo-point.js';
import { hashCodeOf } from '../geometry/hash-code.js';

/** A position observed at a moment in time. */
export class GpsTracePoint {
	readonly position: GeoPoint;
	private readonly millis: number;

	constructor(time: Date, position: GeoPoint) {
		const millis = time.getTime();
		if (Number.isNaN(millis)) {
			throw new GeoArgumentError('time must be a valid date.', { argument: 'time', value: time });
		}
		this.millis = millis;
		this.position = position;
	}

	/** A copy, so callers cannot mutate the point. */
	get time(): Date {
		return new Date(this.millis);
	}

	toMillis(): number {
		return this.millis;
	}

	withTime(time: Date): GpsTracePoint {
		return new GpsTracePoint(time, this.position);
	}

	withPosition(position: GeoPoint): GpsTracePoint {
		return new GpsTracePoint(this.time, position);
	}

	isEqual(other: GpsTracePoint): boolean {
		return this.millis === other.millis && this.position.isEqual(other.position);
	}

	hashCode(): number {
		return hashCodeOf(this.millis, this.position);
	}

	toString(): string {
		return `${this.time.toISOString()} ${this.position.toString()}`;
	}
}
