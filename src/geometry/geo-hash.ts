import { GeoArgumentError } from './errors.js';
import { GeoPoint } from './geo-point.js';
import { hashCodeOf } from './hash-code.js';

// No a, i, l or o.
export const GEO_HASH_ALPHABET = '0123456789bcdefghjkmnpqrstuvwxyz';

const BITS_PER_CHAR = 5;
const DEFAULT_BITS_PER_AXIS = 30;

const CHAR_TO_INDEX: ReadonlyMap<string, number> = new Map(
	Array.from(GEO_HASH_ALPHABET, (char, index) => [char, index] as const)
);

export type GeoHashOptions = {
	/** Bits per axis, a multiple of 5 in [5, 30]. Defaults to 30, which gives 12 characters. */
	bitsPerAxis?: number;
};

function indexOfChar(char: string): number {
	const index = CHAR_TO_INDEX.get(char);
	if (index === undefined) {
		throw new GeoArgumentError(`Invalid geohash character '${char}'.`, { argument: 'hash', value: char });
	}
	return index;
}

function resolveBitsPerAxis(options: GeoHashOptions): number {
	const bits = options.bitsPerAxis ?? DEFAULT_BITS_PER_AXIS;
	if (!Number.isInteger(bits) || bits < 5 || bits > DEFAULT_BITS_PER_AXIS || bits % 5 !== 0) {
		throw new GeoArgumentError(`bitsPerAxis must be a multiple of 5 in [5, 30], got ${bits}.`, {
			argument: 'bitsPerAxis',
			value: bits
		});
	}
	return bits;
}

function axisBits(value: number, min: number, max: number, count: number): boolean[] {
	let floor = min;
	let ceil = max;
	const bits: boolean[] = [];
	for (let i = 0; i < count; i += 1) {
		const mid = (floor + ceil) / 2;
		if (value >= mid) {
			bits.push(true);
			floor = mid;
		} else {
			bits.push(false);
			ceil = mid;
		}
	}
	return bits;
}

function axisValue(bits: readonly boolean[], min: number, max: number): number {
	let floor = min;
	let ceil = max;
	for (const bit of bits) {
		const mid = (floor + ceil) / 2;
		if (bit) {
			floor = mid;
		} else {
			ceil = mid;
		}
	}
	return (floor + ceil) / 2;
}

function toBase32(value: bigint, length: number): string {
	let rest = value;
	let out = '';
	for (let i = 0; i < length; i += 1) {
		out = GEO_HASH_ALPHABET.charAt(Number(rest & 31n)) + out;
		rest >>= 5n;
	}
	return out;
}

/**
 * Cell identifier for a point. The hash is a prefix-ordered base-32 string: every character adds
 * 5 bits of alternating longitude and latitude precision.
 */
export class GeoHash {
	readonly hash: string;
	readonly point: GeoPoint;

	private constructor(hash: string, point: GeoPoint) {
		this.hash = hash;
		this.point = point;
	}

	static fromString(hash: string): GeoHash {
		return new GeoHash(hash, GeoHash.decode(hash));
	}

	static fromPoint(point: GeoPoint, options: GeoHashOptions = {}): GeoHash {
		return new GeoHash(GeoHash.encodePoint(point, options), point);
	}

	/** Rebuilds a hash from its getters, e.g. after deserialization. */
	static fromParts(hash: string, point: GeoPoint): GeoHash {
		GeoHash.requireValid(hash);
		return new GeoHash(hash, point);
	}

	static encode(lat: number, lon: number, options: GeoHashOptions = {}): string {
		return GeoHash.encodePoint(new GeoPoint(lat, lon), options);
	}

	static encodePoint(point: GeoPoint, options: GeoHashOptions = {}): string {
		const bitsPerAxis = resolveBitsPerAxis(options);
		const latBits = axisBits(point.lat, -90.0, 90.0, bitsPerAxis);
		const lonBits = axisBits(point.lon, -180.0, 180.0, bitsPerAxis);
		let value = 0n;
		for (let i = 0; i < bitsPerAxis; i += 1) {
			value = (value << 1n) | (lonBits[i] ? 1n : 0n);
			value = (value << 1n) | (latBits[i] ? 1n : 0n);
		}
		return toBase32(value, (bitsPerAxis * 2) / BITS_PER_CHAR);
	}

	/** Centre of the cell identified by `hash`. */
	static decode(hash: string): GeoPoint {
		GeoHash.requireValid(hash);
		const lonBits: boolean[] = [];
		const latBits: boolean[] = [];
		let position = 0;
		for (const char of hash) {
			const index = indexOfChar(char);
			for (let shift = BITS_PER_CHAR - 1; shift >= 0; shift -= 1) {
				const bit = ((index >> shift) & 1) === 1;
				if (position % 2 === 0) {
					lonBits.push(bit);
				} else {
					latBits.push(bit);
				}
				position += 1;
			}
		}
		return new GeoPoint(axisValue(latBits, -90.0, 90.0), axisValue(lonBits, -180.0, 180.0));
	}

	static isValid(hash: string): boolean {
		if (hash.length === 0) {
			return false;
		}
		for (const char of hash) {
			if (!CHAR_TO_INDEX.has(char)) {
				return false;
			}
		}
		return true;
	}

	private static requireValid(hash: string): void {
		if (!GeoHash.isValid(hash)) {
			throw new GeoArgumentError(`Invalid GeoHash value '${hash}'.`, { argument: 'hash', value: hash });
		}
	}

	get length(): number {
		return this.hash.length;
	}

	/** Prefix containment; only an approximation of geometric containment near cell edges. */
	contains(other: GeoHash): boolean {
		return other.hash.startsWith(this.hash);
	}

	/** Drops `amount` characters, or returns `null` when nothing would remain. */
	decreaseResolution(amount = 1): GeoHash | null {
		if (!Number.isInteger(amount) || amount < 0) {
			throw new GeoArgumentError(`amount must be an integer >= 0, got ${amount}.`, {
				argument: 'amount',
				value: amount
			});
		}
		if (amount >= this.hash.length) {
			return null;
		}
		if (amount === 0) {
			return this;
		}
		return GeoHash.fromString(this.hash.slice(0, this.hash.length - amount));
	}

	/** Truncates to `length` characters. A longer `length` leaves the hash unchanged. */
	setResolution(length: number): GeoHash {
		if (!Number.isInteger(length) || length < 1) {
			throw new GeoArgumentError(`length must be an integer >= 1, got ${length}.`, {
				argument: 'length',
				value: length
			});
		}
		if (length >= this.hash.length) {
			return this;
		}
		return GeoHash.fromString(this.hash.slice(0, length));
	}

	useResolution(other: GeoHash): GeoHash {
		return this.setResolution(other.length);
	}

	/** Hash of `point` at this hash's resolution (at most the default resolution). */
	moveTo(point: GeoPoint): GeoHash {
		return GeoHash.fromPoint(point).setResolution(this.hash.length);
	}

	isEqual(other: GeoHash): boolean {
		return this.hash === other.hash && this.point.isEqual(other.point);
	}

	hashCode(): number {
		return hashCodeOf(this.hash, this.point);
	}

	toString(): string {
		return this.hash;
	}
}
