import { z } from 'zod';

import { formatIssues, GeodesyOptionsError } from './errors.js';

/** WGS-84 equatorial radius, treated as the radius of a sphere. */
export const EARTH_RADIUS_METERS = 6378137.0;

export const GeodesyOptionsSchema = z
	.object({
		earthRadius: z.number().finite().positive().optional(),
		clampCosine: z.boolean().optional()
	})
	.strict();

export type GeodesyOptions = z.infer<typeof GeodesyOptionsSchema>;

export type ResolvedGeodesyOptions = {
	readonly earthRadius: number;
	readonly clampCosine: boolean;
};

export const DEFAULT_GEODESY_OPTIONS: ResolvedGeodesyOptions = Object.freeze({
	earthRadius: EARTH_RADIUS_METERS,
	clampCosine: false
});

export function resolveGeodesyOptions(options?: GeodesyOptions): ResolvedGeodesyOptions {
	if (options === undefined) {
		return DEFAULT_GEODESY_OPTIONS;
	}
	const parsed = GeodesyOptionsSchema.safeParse(options);
	if (!parsed.success) {
		throw new GeodesyOptionsError(`Invalid geodesy options: ${formatIssues(parsed.error)}`);
	}
	return Object.freeze({
		earthRadius: parsed.data.earthRadius ?? DEFAULT_GEODESY_OPTIONS.earthRadius,
		clampCosine: parsed.data.clampCosine ?? DEFAULT_GEODESY_OPTIONS.clampCosine
	});
}
