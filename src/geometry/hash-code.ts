const float64 = new Float64Array(1);
const int32 = new Int32Array(float64.buffer);

export type Hashable = number | string | null | { hashCode(): number };

function hashNumber(value: number): number {
	// -0 and 0 compare equal, so they must hash the same.
	float64[0] = value === 0 ? 0 : value;
	return (int32[0] ^ int32[1]) | 0;
}

function hashString(value: string): number {
	let hash = 0;
	for (let i = 0; i < value.length; i += 1) {
		hash = (Math.imul(31, hash) + value.charCodeAt(i)) | 0;
	}
	return hash;
}

function hashValue(value: Hashable): number {
	if (value === null) {
		return 0;
	}
	if (typeof value === 'number') {
		return hashNumber(value);
	}
	if (typeof value === 'string') {
		return hashString(value);
	}
	return value.hashCode();
}

export function hashCodeOf(...values: Hashable[]): number {
	let hash = 1;
	for (const value of values) {
		hash = (Math.imul(31, hash) + hashValue(value)) | 0;
	}
	return hash;
}
