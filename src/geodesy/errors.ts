import type { ZodError } from 'zod';

export function formatIssues(error: ZodError): string {
	return error.issues
		.map((issue) => {
			const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
			return `${path}: ${issue.message}`;
		})
		.join('; ');
}

export class GeodesyOptionsError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'GeodesyOptionsError';
	}
}

export class LatLngParseError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'LatLngParseError';
	}
}
