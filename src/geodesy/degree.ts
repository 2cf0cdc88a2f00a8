import { float32, float64, type FloatPrecision } from './precision.js';

// Past this magnitude adding or subtracting 360 may not change the value at all.
const MAX_NORMALIZABLE_DEGREES = 1e9;

export type DegreeFunctions = {
	toRadian(deg: number): number;
	fromRadian(rad: number): number;
	/** Maps into [-180, 180). NaN is returned as is, |deg| > 1e9 yields 0. */
	normalizeRelative(deg: number): number;
	/** Maps into [0, 360). NaN is returned as is, |deg| > 1e9 yields 0. */
	normalizeAbsolute(deg: number): number;
};

export function createDegree(precision: FloatPrecision): DegreeFunctions {
	const { pi, round } = precision;

	function wrap(value: number, min: number, max: number): number {
		if (Number.isNaN(value)) {
			return value;
		}
		if (value > MAX_NORMALIZABLE_DEGREES || value < -MAX_NORMALIZABLE_DEGREES) {
			return 0;
		}
		let deg = round(value);
		while (deg >= max) {
			deg = round(deg - 360);
		}
		while (deg < min) {
			deg = round(deg + 360);
		}
		// A value just below min can round onto max once 360 is added.
		return deg >= max ? round(deg - 360) : deg;
	}

	return Object.freeze({
		toRadian: (deg: number) => round(round(round(deg) * pi) / 180),
		fromRadian: (rad: number) => round(round(round(rad) * 180) / pi),
		normalizeRelative: (deg: number) => wrap(deg, -180, 180),
		normalizeAbsolute: (deg: number) => wrap(deg, 0, 360)
	});
}

export const Degree: DegreeFunctions = createDegree(float64);

export const DegreeF: DegreeFunctions = createDegree(float32);

export const { toRadian, fromRadian, normalizeRelative, normalizeAbsolute } = Degree;
