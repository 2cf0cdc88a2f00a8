export {
	createDegree,
	Degree,
	DegreeF,
	fromRadian,
	normalizeAbsolute,
	normalizeRelative,
	toRadian,
	type DegreeFunctions
} from './degree.js';
export { GeodesyOptionsError, LatLngParseError } from './errors.js';
export { BasicLatLng, LatLng, LatLngF, type LatLngLiteral } from './lat-lng.js';
export {
	DEFAULT_GEODESY_OPTIONS,
	EARTH_RADIUS_METERS,
	GeodesyOptionsSchema,
	resolveGeodesyOptions,
	type GeodesyOptions,
	type ResolvedGeodesyOptions
} from './options.js';
export { LatLngLiteralSchema, parseLatLng } from './parse.js';
export {
	definePrecision,
	float32,
	float64,
	type Float32,
	type Float64,
	type FloatPrecision
} from './precision.js';
