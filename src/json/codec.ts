import { GeoArgumentError } from '../geometry/errors.js';
import { Difference, Intersection, Inverse, Union, type GeoArea } from '../geometry/geo-area.js';
import { GeoCircle } from '../geometry/geo-circle.js';
import { GeoHash } from '../geometry/geo-hash.js';
import { GeoLine } from '../geometry/geo-line.js';
import { GeoPoint } from '../geometry/geo-point.js';
import { GeoPolyLine } from '../geometry/geo-poly-line.js';
import { GeoRectangle } from '../geometry/geo-rectangle.js';
import { GeoVector } from '../geometry/geo-vector.js';
import { GpsTrace } from '../gpstrace/gps-trace.js';
import { GpsTracePoint } from '../gpstrace/gps-trace-point.js';

import {
	GeoAreaJsonSchema,
	GeoHashJsonSchema,
	GeoLineJsonSchema,
	GeoPointJsonSchema,
	GeoPolyLineJsonSchema,
	GeoVectorJsonSchema,
	GpsTraceJsonSchema,
	GpsTracePointJsonSchema,
	type GeoAreaJson,
	type GeoHashJson,
	type GeoLineJson,
	type GeoPointJson,
	type GeoPolyLineJson,
	type GeoVectorJson,
	type GpsTraceJson,
	type GpsTracePointJson
} from './types.js';

export type GeoJsonParseOptions = {
	/** Deepest nesting of area expressions accepted. Defaults to 64. */
	maxDepth?: number;
};

const DEFAULT_MAX_DEPTH = 64;

export function toGeoPointJson(point: GeoPoint): GeoPointJson {
	if (point.elevationMeters === null) {
		return { lat: point.lat, lon: point.lon };
	}
	return { lat: point.lat, lon: point.lon, elevationMeters: point.elevationMeters };
}

function buildPoint(json: GeoPointJson): GeoPoint {
	return new GeoPoint(json.lat, json.lon, json.elevationMeters);
}

export function fromGeoPointJson(value: unknown): GeoPoint {
	return buildPoint(GeoPointJsonSchema.parse(value));
}

export function toGeoVectorJson(vector: GeoVector): GeoVectorJson {
	return { northing: vector.northing, easting: vector.easting, elevationMeters: vector.elevationMeters };
}

export function fromGeoVectorJson(value: unknown): GeoVector {
	const json = GeoVectorJsonSchema.parse(value);
	return new GeoVector(json.northing, json.easting, json.elevationMeters);
}

export function toGeoLineJson(line: GeoLine | GeoRectangle): GeoLineJson {
	return { southWest: toGeoPointJson(line.southWest), northEast: toGeoPointJson(line.northEast) };
}

export function fromGeoLineJson(value: unknown): GeoLine {
	const json = GeoLineJsonSchema.parse(value);
	return new GeoLine(buildPoint(json.southWest), buildPoint(json.northEast));
}

export function toGeoPolyLineJson(polyLine: GeoPolyLine): GeoPolyLineJson {
	return { points: polyLine.points.map((point) => toGeoPointJson(point)) };
}

export function fromGeoPolyLineJson(value: unknown): GeoPolyLine {
	const json = GeoPolyLineJsonSchema.parse(value);
	return new GeoPolyLine(json.points.map((point) => buildPoint(point)));
}

export function toGeoHashJson(geoHash: GeoHash): GeoHashJson {
	return { hash: geoHash.hash, point: toGeoPointJson(geoHash.point) };
}

export function fromGeoHashJson(value: unknown): GeoHash {
	const json = GeoHashJsonSchema.parse(value);
	return json.point ? GeoHash.fromParts(json.hash, buildPoint(json.point)) : GeoHash.fromString(json.hash);
}

export function toGpsTracePointJson(point: GpsTracePoint): GpsTracePointJson {
	return { time: point.time.toISOString(), position: toGeoPointJson(point.position) };
}

function buildTracePoint(json: GpsTracePointJson): GpsTracePoint {
	return new GpsTracePoint(new Date(json.time), buildPoint(json.position));
}

export function fromGpsTracePointJson(value: unknown): GpsTracePoint {
	return buildTracePoint(GpsTracePointJsonSchema.parse(value));
}

export function toGpsTraceJson(trace: GpsTrace): GpsTraceJson {
	return { points: trace.points.map((point) => toGpsTracePointJson(point)) };
}

export function fromGpsTraceJson(value: unknown): GpsTrace {
	const json = GpsTraceJsonSchema.parse(value);
	return new GpsTrace(json.points.map((point) => buildTracePoint(point)));
}

export function toGeoAreaJson(area: GeoArea): GeoAreaJson {
	switch (area.kind) {
		case 'rectangle':
			return { type: 'rectangle', ...toGeoLineJson(area) };
		case 'circle':
			return { type: 'circle', center: toGeoPointJson(area.center), radiusMeters: area.radiusMeters };
		case 'inverse':
			return { type: 'inverse', area: toGeoAreaJson(area.operand) };
		case 'union':
		case 'intersection':
		case 'difference':
			return { type: area.kind, left: toGeoAreaJson(area.left), right: toGeoAreaJson(area.right) };
	}
}

function buildArea(json: GeoAreaJson, depth: number, maxDepth: number): GeoArea {
	if (depth > maxDepth) {
		throw new GeoArgumentError(`Area expression is nested deeper than ${maxDepth} levels.`, {
			argument: 'maxDepth',
			value: maxDepth
		});
	}
	switch (json.type) {
		case 'rectangle':
			return new GeoRectangle(buildPoint(json.southWest), buildPoint(json.northEast));
		case 'circle':
			return new GeoCircle(buildPoint(json.center), json.radiusMeters);
		case 'inverse':
			return new Inverse(buildArea(json.area, depth + 1, maxDepth));
		case 'union':
		case 'intersection':
		case 'difference': {
			const left = buildArea(json.left, depth + 1, maxDepth);
			const right = buildArea(json.right, depth + 1, maxDepth);
			if (json.type === 'union') {
				return new Union(left, right);
			}
			return json.type === 'intersection' ? new Intersection(left, right) : new Difference(left, right);
		}
	}
}

export function fromGeoAreaJson(value: unknown, options: GeoJsonParseOptions = {}): GeoArea {
	const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
	return buildArea(GeoAreaJsonSchema.parse(value), 1, maxDepth);
}

export function parseGeoAreaJson(raw: string, options: GeoJsonParseOptions = {}): GeoArea {
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new Error(`Invalid area JSON: ${message}`);
	}
	return fromGeoAreaJson(parsed, options);
}

export function stringifyGeoArea(area: GeoArea): string {
	return JSON.stringify(toGeoAreaJson(area));
}
