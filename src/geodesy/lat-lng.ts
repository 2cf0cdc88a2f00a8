import { createDegree, Degree, DegreeF, type DegreeFunctions } from './degree.js';
import { resolveGeodesyOptions, type GeodesyOptions } from './options.js';
import { float32, float64, type Float32, type Float64, type FloatPrecision } from './precision.js';

export type LatLngLiteral = {
	lat: number;
	lng: number;
};

function degreeFor(precision: FloatPrecision): DegreeFunctions {
	if (precision === float64) {
		return Degree;
	}
	if (precision === float32) {
		return DegreeF;
	}
	return createDegree(precision);
}

function typeName(precision: FloatPrecision): string {
	if (precision === float64) {
		return 'LatLng';
	}
	if (precision === float32) {
		return 'LatLngF';
	}
	return `BasicLatLng<${precision.kind}>`;
}

/**
 * A latitude/longitude pair in degrees, evaluated in the given floating-point precision.
 *
 * Nothing is validated: out-of-range and non-finite coordinates are kept and flow through the
 * calculations as ordinary IEEE values.
 */
export class BasicLatLng<P extends FloatPrecision = FloatPrecision> {
	readonly lat: number;
	readonly lng: number;
	readonly precision: P;

	constructor(lat: number, lng: number, precision: P) {
		this.lat = precision.round(lat);
		this.lng = precision.round(lng);
		this.precision = precision;
		Object.freeze(this);
	}

	static from<P extends FloatPrecision>(coords: LatLngLiteral, precision: P): BasicLatLng<P> {
		return new BasicLatLng(coords.lat, coords.lng, precision);
	}

	/**
	 * Great-circle distance to `other` in meters, on a sphere of `options.earthRadius`.
	 *
	 * The acos argument is left unclamped unless `clampCosine` is set, so identical or antipodal
	 * points can come out as NaN when rounding pushes it just past ±1.
	 */
	distanceFrom(other: BasicLatLng<P>, options?: GeodesyOptions): number {
		const { earthRadius, clampCosine } = resolveGeodesyOptions(options);
		const { round } = this.precision;
		const degree = degreeFor(this.precision);

		const latRadian = degree.toRadian(this.lat);
		const lngRadian = degree.toRadian(this.lng);
		const otherLatRadian = degree.toRadian(other.lat);
		const otherLngRadian = degree.toRadian(other.lng);
		const lngRadianDiff = round(otherLngRadian - lngRadian);

		const sines = round(round(Math.sin(latRadian)) * round(Math.sin(otherLatRadian)));
		const cosines = round(
			round(round(Math.cos(latRadian)) * round(Math.cos(otherLatRadian))) *
				round(Math.cos(lngRadianDiff))
		);
		let cosine = round(sines + cosines);
		if (clampCosine) {
			cosine = Math.min(1, Math.max(-1, cosine));
		}

		return round(round(earthRadius) * round(Math.acos(cosine)));
	}

	/**
	 * Compass bearing in [0, 360) of an arrow drawn from `other` toward this point.
	 *
	 * Computed as the initial bearing this→other turned around by 180°.
	 */
	azimuthFrom(other: BasicLatLng<P>): number {
		const { round } = this.precision;
		const degree = degreeFor(this.precision);

		const latRadian = degree.toRadian(this.lat);
		const lngRadian = degree.toRadian(this.lng);
		const otherLatRadian = degree.toRadian(other.lat);
		const otherLngRadian = degree.toRadian(other.lng);
		const lngRadianDiff = round(otherLngRadian - lngRadian);

		const y = round(Math.sin(lngRadianDiff));
		const x = round(
			round(round(Math.cos(latRadian)) * round(Math.tan(otherLatRadian))) -
				round(round(Math.sin(latRadian)) * round(Math.cos(lngRadianDiff)))
		);
		return degree.normalizeAbsolute(round(degree.fromRadian(round(Math.atan2(y, x))) + 180));
	}

	/** Returns a `LatLng` or `LatLngF` when given the prebuilt `float64` or `float32`. */
	withPrecision(precision: Float64): LatLng;
	withPrecision(precision: Float32): LatLngF;
	withPrecision<Q extends FloatPrecision>(precision: Q): BasicLatLng<Q>;
	withPrecision(precision: FloatPrecision): BasicLatLng {
		if (precision === float64) {
			return new LatLng(this.lat, this.lng);
		}
		if (precision === float32) {
			return new LatLngF(this.lat, this.lng);
		}
		return new BasicLatLng(this.lat, this.lng, precision);
	}

	isEqual(other: BasicLatLng<P>): boolean {
		return (
			this.precision.kind === other.precision.kind &&
			this.lat === other.lat &&
			this.lng === other.lng
		);
	}

	toJSON(): LatLngLiteral {
		return { lat: this.lat, lng: this.lng };
	}

	toString(): string {
		return `${typeName(this.precision)}(${this.lat}, ${this.lng})`;
	}
}

export class LatLng extends BasicLatLng<Float64> {
	constructor(lat: number, lng: number) {
		super(lat, lng, float64);
	}

	static of(coords: LatLngLiteral): LatLng {
		return new LatLng(coords.lat, coords.lng);
	}
}

export class LatLngF extends BasicLatLng<Float32> {
	constructor(lat: number, lng: number) {
		super(lat, lng, float32);
	}

	static of(coords: LatLngLiteral): LatLngF {
		return new LatLngF(coords.lat, coords.lng);
	}
}
