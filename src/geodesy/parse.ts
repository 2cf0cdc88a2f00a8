import { z } from 'zod';

import { formatIssues, LatLngParseError } from './errors.js';
import { LatLng } from './lat-lng.js';

// Range is not checked. NaN and ±Infinity are accepted as coordinates.
const CoordinateSchema = z.union([z.number(), z.nan()]);

export const LatLngLiteralSchema = z.object({
	lat: CoordinateSchema,
	lng: CoordinateSchema
});

export function parseLatLng(raw: unknown): LatLng {
	const parsed = LatLngLiteralSchema.safeParse(raw);
	if (!parsed.success) {
		throw new LatLngParseError(`Invalid lat/lng: ${formatIssues(parsed.error)}`);
	}
	return LatLng.of(parsed.data);
}
