export { GeoArgumentError } from './errors.js';
export { Duration } from './duration.js';
export {
	CROW_FLIGHT_SPEED_TABLE,
	EARTH_CIRCUMFERENCE_X,
	EARTH_CIRCUMFERENCE_Y,
	EARTH_RADIUS_X_METERS,
	EARTH_RADIUS_Y_METERS,
	LON180,
	METERS_PER_DEGREE_LAT,
	METERS_PER_DEGREE_LON_EQUATOR,
	degreesLatToMeters,
	degreesLonToMetersAtLat,
	distanceInMeters,
	estimatedMinTravelTime,
	mapToLat,
	mapToLon,
	metersToDegreesLat,
	metersToDegreesLonAtLat,
	type SpeedBand,
	type TravelTimeOptions
} from './geo.js';
export { GeoPoint } from './geo-point.js';
export { GeoVector } from './geo-vector.js';
export { GeoLine } from './geo-line.js';
export { GeoPolyLine } from './geo-poly-line.js';
export { GeoRectangle } from './geo-rectangle.js';
export { GeoCircle } from './geo-circle.js';
export type { AreaCovers, GeoArea, GeoAreaKind, GeoPrimitive } from './geo-area.js';
export {
	Difference,
	Intersection,
	Inverse,
	Union,
	add,
	areaCenter,
	areaHashCode,
	areaOrigin,
	boundingBox,
	contains,
	difference,
	fromAreas,
	innerPixelate,
	intersection,
	inverse,
	isAreaEqual,
	isCompound,
	moveTo,
	optimize,
	overlaps,
	pixelate,
	translate,
	translateMeters,
	union
} from './geo-area.js';
export { GEO_HASH_ALPHABET, GeoHash, type GeoHashOptions } from './geo-hash.js';
