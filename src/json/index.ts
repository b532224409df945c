export {
	fromGeoAreaJson,
	fromGeoHashJson,
	fromGeoLineJson,
	fromGeoPointJson,
	fromGeoPolyLineJson,
	fromGeoVectorJson,
	fromGpsTraceJson,
	fromGpsTracePointJson,
	parseGeoAreaJson,
	stringifyGeoArea,
	toGeoAreaJson,
	toGeoHashJson,
	toGeoLineJson,
	toGeoPointJson,
	toGeoPolyLineJson,
	toGeoVectorJson,
	toGpsTraceJson,
	toGpsTracePointJson,
	type GeoJsonParseOptions
} from './codec.js';
export {
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
