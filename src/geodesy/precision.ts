/**
 * A floating-point kind the geodesy functions can be evaluated in.
 *
 * JavaScript only has one number type, so narrower kinds are emulated by snapping every
 * intermediate result through `round`.
 */
export type FloatPrecision<K extends string = string> = {
	readonly kind: K;
	/** π as representable in this precision. */
	readonly pi: number;
	round(value: number): number;
};

export type Float64 = FloatPrecision<'float64'>;
export type Float32 = FloatPrecision<'float32'>;

export function definePrecision<K extends string>(
	kind: K,
	round: (value: number) => number
): FloatPrecision<K> {
	return Object.freeze({ kind, pi: round(Math.PI), round });
}

export const float64: Float64 = definePrecision('float64', (value) => value);

export const float32: Float32 = definePrecision('float32', Math.fround);
