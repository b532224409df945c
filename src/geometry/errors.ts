export class GeoArgumentError extends Error {
	readonly argument: string;
	readonly value: unknown;

	constructor(message: string, options: { argument: string; value?: unknown }) {
		super(message);
		this.name = 'GeoArgumentError';
		this.argument = options.argument;
		this.value = options.value;
	}
}

export function requireFinite(argument: string, value: number): number {
	if (!Number.isFinite(value)) {
		throw new GeoArgumentError(`${argument} must be a finite number, got ${String(value)}.`, {
			argument,
			value
		});
	}
	return value;
}

export function requireInRange(argument: string, value: number, min: number, max: number): number {
	requireFinite(argument, value);
	if (value < min || value > max) {
		throw new GeoArgumentError(`${argument} must be in [${min}, ${max}], got ${value}.`, {
			argument,
			value
		});
	}
	return value;
}
