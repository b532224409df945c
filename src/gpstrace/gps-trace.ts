import { GeoArgumentError } from '../geometry/errors.js';
import type { Duration } from '../geometry/duration.js';
import { hashCodeOf } from '../geometry/hash-code.js';
import type { GpsTracePoint } from './gps-trace-point.js';

/** Trace points in the order they were recorded, oldest first. */
export class GpsTrace {
	readonly points: readonly GpsTracePoint[];

	constructor(points: readonly GpsTracePoint[] = []) {
		this.points = [...points];
	}

	/**
	 * Keeps the last `maxSize` points, then drops those recorded more than `maxAge` before the
	 * newest one.
	 */
	static limitSize(
		maxAge: Duration,
		maxSize: number,
		points: readonly GpsTracePoint[],
		...more: GpsTracePoint[]
	): GpsTracePoint[] {
		if (!Number.isInteger(maxSize) || maxSize < 0) {
			throw new GeoArgumentError(`maxSize must be an integer >= 0, got ${maxSize}.`, {
				argument: 'maxSize',
				value: maxSize
			});
		}
		const all = [...points, ...more];
		const recent = all.slice(Math.max(0, all.length - maxSize));
		const newest = recent[recent.length - 1];
		if (!newest) {
			return [];
		}
		const oldest = newest.toMillis() - maxAge.toMillis();
		return recent.filter((point) => point.toMillis() >= oldest);
	}

	get lastPoint(): GpsTracePoint | null {
		return this.points[this.points.length - 1] ?? null;
	}

	withPoints(points: readonly GpsTracePoint[], ...more: GpsTracePoint[]): GpsTrace {
		return new GpsTrace([...points, ...more]);
	}

	isEqual(other: GpsTrace): boolean {
		return (
			this.points.length === other.points.length &&
			this.points.every((point, index) => {
				const that = other.points[index];
				return that !== undefined && point.isEqual(that);
			})
		);
	}

	hashCode(): number {
		return hashCodeOf(...this.points);
	}
}
