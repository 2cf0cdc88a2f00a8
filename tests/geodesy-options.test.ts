import { describe, expect, it } from 'vitest';

import { GeodesyOptionsError, LatLngParseError } from '../src/geodesy/errors.js';
import {
	DEFAULT_GEODESY_OPTIONS,
	EARTH_RADIUS_METERS,
	resolveGeodesyOptions
} from '../src/geodesy/options.js';
import { parseLatLng } from '../src/geodesy/parse.js';
import { LatLng } from '../src/index.js';

describe('resolveGeodesyOptions', () => {
	it('defaults to the WGS-84 equatorial radius without clamping', () => {
		expect(resolveGeodesyOptions()).toBe(DEFAULT_GEODESY_OPTIONS);
		expect(resolveGeodesyOptions({})).toEqual({ earthRadius: 6378137, clampCosine: false });
		expect(EARTH_RADIUS_METERS).toBe(6378137);
	});

	it('applies overrides and freezes the result', () => {
		const resolved = resolveGeodesyOptions({ earthRadius: 6371008.8, clampCosine: true });
		expect(resolved).toEqual({ earthRadius: 6371008.8, clampCosine: true });
		expect(Object.isFrozen(resolved)).toBe(true);
	});

	it('rejects non-positive or non-finite radii', () => {
		expect(() => resolveGeodesyOptions({ earthRadius: 0 })).toThrow(GeodesyOptionsError);
		expect(() => resolveGeodesyOptions({ earthRadius: Number.POSITIVE_INFINITY })).toThrow(
			/earthRadius/
		);
	});

	it('rejects unknown keys', () => {
		const options = { clampCosine: false, radius: 1 };
		expect(() => resolveGeodesyOptions(options)).toThrow(/Invalid geodesy options/);
	});
});

describe('parseLatLng', () => {
	it('builds a double-precision point from a plain object', () => {
		const point = parseLatLng({ lat: 35.5, lng: 139.25 });
		expect(point).toBeInstanceOf(LatLng);
		expect(point.toJSON()).toEqual({ lat: 35.5, lng: 139.25 });
	});

	it('accepts NaN and out-of-range coordinates', () => {
		const point = parseLatLng({ lat: Number.NaN, lng: 400 });
		expect(point.lat).toBeNaN();
		expect(point.lng).toBe(400);
	});

	it('names the offending field', () => {
		expect(() => parseLatLng({ lat: '35', lng: 139 })).toThrow(LatLngParseError);
		expect(() => parseLatLng({ lat: 35 })).toThrow(/lng/);
		expect(() => parseLatLng(null)).toThrow(/\(root\)/);
	});
});
