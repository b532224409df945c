import { GeoArgumentError } from './errors.js';
import type { GeoCircle } from './geo-circle.js';
import { GeoPoint, metersToVector } from './geo-point.js';
import { GeoRectangle } from './geo-rectangle.js';
import { GeoVector } from './geo-vector.js';
import { hashCodeOf } from './hash-code.js';
import { anyCellsOverlap, boundingBoxOf, intersectAll, isCovered, subtractAll } from './pixelate.js';

export type GeoPrimitive = GeoRectangle | GeoCircle;

export type GeoArea = GeoPrimitive | Union | Intersection | Difference | Inverse;

export type GeoAreaKind = GeoArea['kind'];

/** Outer cover, inner cover and bounding box of a derived area. */
export type AreaCovers = {
	readonly cells: readonly GeoRectangle[];
	readonly innerCells: readonly GeoRectangle[];
	readonly box: GeoRectangle;
};

// A cover made only of lines and points has no surface and counts as empty.
function requireBox(cells: readonly GeoRectangle[], message: string, value: unknown): GeoRectangle {
	const box = boundingBoxOf(cells);
	if (!box || cells.every((cell) => cell.surface === 0)) {
		throw new GeoArgumentError(message, { argument: 'area', value });
	}
	return box;
}

function intersectionCovers(left: GeoArea, right: GeoArea): AreaCovers {
	const cells = intersectAll(pixelate(left), pixelate(right));
	return {
		cells,
		innerCells: intersectAll(innerPixelate(left), innerPixelate(right)),
		box: requireBox(cells, 'Intersection operands do not overlap.', right)
	};
}

function differenceCovers(left: GeoArea, right: GeoArea): AreaCovers {
	const cells = subtractAll(pixelate(left), innerPixelate(right));
	return {
		cells,
		innerCells: subtractAll(innerPixelate(left), pixelate(right)),
		box: requireBox(cells, 'Difference is empty: the subtracted area covers the whole area.', right)
	};
}

function inverseCovers(operand: GeoArea): AreaCovers {
	const world = [GeoRectangle.world()];
	const cells = subtractAll(world, innerPixelate(operand));
	return {
		cells,
		innerCells: subtractAll(world, pixelate(operand)),
		box: requireBox(cells, 'Inverse is empty: the area covers the whole world.', operand)
	};
}

export class Union {
	readonly kind = 'union' as const;
	readonly left: GeoArea;
	readonly right: GeoArea;

	constructor(left: GeoArea, right: GeoArea) {
		this.left = left;
		this.right = right;
	}
}

/**
 * The part shared by both operands. `covers` is only passed when moving an existing
 * intersection; otherwise the covers are computed from the operands.
 */
export class Intersection {
	readonly kind = 'intersection' as const;
	readonly left: GeoArea;
	readonly right: GeoArea;
	readonly cells: readonly GeoRectangle[];
	readonly innerCells: readonly GeoRectangle[];
	readonly box: GeoRectangle;

	constructor(left: GeoArea, right: GeoArea, covers?: AreaCovers) {
		const { cells, innerCells, box } = covers ?? intersectionCovers(left, right);
		this.left = left;
		this.right = right;
		this.cells = cells;
		this.innerCells = innerCells;
		this.box = box;
	}
}

/** Everything in `left` that is not in `right`. */
export class Difference {
	readonly kind = 'difference' as const;
	readonly left: GeoArea;
	readonly right: GeoArea;
	readonly cells: readonly GeoRectangle[];
	readonly innerCells: readonly GeoRectangle[];
	readonly box: GeoRectangle;

	constructor(left: GeoArea, right: GeoArea, covers?: AreaCovers) {
		const { cells, innerCells, box } = covers ?? differenceCovers(left, right);
		this.left = left;
		this.right = right;
		this.cells = cells;
		this.innerCells = innerCells;
		this.box = box;
	}
}

/** Everything on Earth outside `operand`. */
export class Inverse {
	readonly kind = 'inverse' as const;
	readonly operand: GeoArea;
	readonly cells: readonly GeoRectangle[];
	readonly innerCells: readonly GeoRectangle[];
	readonly box: GeoRectangle;

	constructor(operand: GeoArea) {
		const { cells, innerCells, box } = inverseCovers(operand);
		this.operand = operand;
		this.cells = cells;
		this.innerCells = innerCells;
		this.box = box;
	}
}

export function union(left: GeoArea, right: GeoArea): Union {
	return new Union(left, right);
}

export function intersection(left: GeoArea, right: GeoArea): Intersection {
	return new Intersection(left, right);
}

export function difference(left: GeoArea, right: GeoArea): Difference {
	return new Difference(left, right);
}

export function inverse(operand: GeoArea): Inverse {
	return new Inverse(operand);
}

export function isCompound(area: GeoArea): boolean {
	return area.kind !== 'rectangle' && area.kind !== 'circle';
}

/**
 * Flattens an area into non-wrapped rectangles that together cover it. Cells may overlap and the
 * list is never empty.
 */
export function pixelate(area: GeoArea): GeoRectangle[] {
	switch (area.kind) {
		case 'rectangle':
			return area.split();
		case 'circle':
			return area.boundingBox().split();
		case 'union':
			return [...pixelate(area.left), ...pixelate(area.right)];
		case 'intersection':
		case 'difference':
		case 'inverse':
			return [...area.cells];
	}
}

/** Non-wrapped rectangles that lie inside the area. May be empty. */
export function innerPixelate(area: GeoArea): GeoRectangle[] {
	switch (area.kind) {
		case 'rectangle':
			return area.split();
		case 'circle':
			return area.innerBoundingBox().split();
		case 'union':
			return [...innerPixelate(area.left), ...innerPixelate(area.right)];
		case 'intersection':
		case 'difference':
		case 'inverse':
			return [...area.innerCells];
	}
}

export function boundingBox(area: GeoArea): GeoRectangle {
	switch (area.kind) {
		case 'rectangle':
			return area;
		case 'circle':
			return area.boundingBox();
		case 'union':
			return boundingBox(area.left).grow(boundingBox(area.right));
		case 'intersection':
		case 'difference':
		case 'inverse':
			return area.box;
	}
}

export function areaOrigin(area: GeoArea): GeoPoint {
	return boundingBox(area).southWest;
}

export function areaCenter(area: GeoArea): GeoPoint {
	return area.kind === 'circle' ? area.center : boundingBox(area).center;
}

/** Symmetric: `overlaps(a, b) === overlaps(b, a)`. Touching edges count as overlap. */
export function overlaps(a: GeoArea, b: GeoArea): boolean {
	if (a.kind === 'union') {
		return overlaps(a.left, b) || overlaps(a.right, b);
	}
	if (b.kind === 'union') {
		return overlaps(a, b.left) || overlaps(a, b.right);
	}
	if (a.kind === 'rectangle' && b.kind === 'rectangle') {
		return a.overlapsRectangle(b);
	}
	return anyCellsOverlap(pixelate(a), pixelate(b));
}

function cellsWithin(parts: readonly GeoRectangle[], area: GeoArea): boolean {
	return isCovered(pixelate(area), parts);
}

export function contains(container: GeoArea, other: GeoArea | GeoPoint): boolean {
	const area = other instanceof GeoPoint ? GeoRectangle.ofPoint(other) : other;
	switch (container.kind) {
		case 'rectangle':
			return cellsWithin(container.split(), area);
		case 'circle':
			// Approximated by the bounding box.
			return cellsWithin(container.boundingBox().split(), area);
		case 'union':
			// Disjoint operands leave gaps in the bounding box, so each must be checked on its own.
			if (overlaps(container.left, container.right)) {
				return contains(boundingBox(container), area);
			}
			return contains(container.left, area) || contains(container.right, area);
		case 'intersection':
			return contains(container.left, area) && contains(container.right, area);
		case 'difference':
			return contains(container.left, area) && !overlaps(container.right, area);
		case 'inverse':
			return !overlaps(container.operand, area);
	}
}

/** Limits the northing of `vector` so that `box` stops at the poles instead of being clamped. */
function stopAtPoles(box: GeoRectangle, vector: GeoVector): GeoVector {
	const northing = Math.min(
		Math.max(vector.northing, -90.0 - box.southWest.lat),
		90.0 - box.northEast.lat
	);
	return northing === vector.northing
		? vector
		: new GeoVector(northing, vector.easting, vector.elevationMeters);
}

function shiftCells(cells: readonly GeoRectangle[], vector: GeoVector): GeoRectangle[] {
	return cells.flatMap((cell) => cell.translate(vector).split());
}

function shiftCovers(covers: AreaCovers, vector: GeoVector): AreaCovers {
	return {
		cells: shiftCells(covers.cells, vector),
		innerCells: shiftCells(covers.innerCells, vector),
		box: covers.box.translate(vector)
	};
}

/**
 * Moves an area. Primitives clamp at the poles. Intersections and differences move as a whole,
 * and an inverse moves its operand as a whole; their northing stops where the bounding box
 * reaches a pole, so a moved area is never empty.
 */
export function translate(area: GeoArea, vector: GeoVector): GeoArea {
	switch (area.kind) {
		case 'rectangle':
		case 'circle':
			return area.translate(vector);
		case 'union':
			return new Union(translate(area.left, vector), translate(area.right, vector));
		case 'intersection': {
			const moved = stopAtPoles(area.box, vector);
			return new Intersection(
				translate(area.left, moved),
				translate(area.right, moved),
				shiftCovers(area, moved)
			);
		}
		case 'difference': {
			const moved = stopAtPoles(area.box, vector);
			return new Difference(
				translate(area.left, moved),
				translate(area.right, moved),
				shiftCovers(area, moved)
			);
		}
		case 'inverse':
			return new Inverse(translate(area.operand, stopAtPoles(boundingBox(area.operand), vector)));
	}
}

/** Translates by meters, scaling longitude at the latitude of the area's origin. */
export function translateMeters(
	area: GeoArea,
	northingMeters: number,
	eastingMeters: number,
	elevationMeters = 0.0
): GeoArea {
	return translate(area, metersToVector(areaOrigin(area), northingMeters, eastingMeters, elevationMeters));
}

/** Moves the area so that the south-west corner of its bounding box lands on `origin`. */
export function moveTo(area: GeoArea, origin: GeoPoint): GeoArea {
	if (area.kind === 'rectangle' || area.kind === 'circle') {
		return area.moveTo(origin);
	}
	const southWest = boundingBox(area).southWest;
	return translate(area, new GeoVector(origin.lat - southWest.lat, origin.lon - southWest.lon));
}

/**
 * Drops operands that do not change the covered area. The result covers the same area but is not
 * a canonical form.
 */
export function optimize(area: GeoArea): GeoArea {
	switch (area.kind) {
		case 'rectangle':
		case 'circle':
			return area;
		case 'union':
			if (contains(area.left, area.right)) {
				return optimize(area.left);
			}
			if (contains(area.right, area.left)) {
				return optimize(area.right);
			}
			return area;
		case 'intersection':
			if (contains(area.left, area.right)) {
				return optimize(area.right);
			}
			if (contains(area.right, area.left)) {
				return optimize(area.left);
			}
			return area;
		case 'difference':
			return overlaps(area.left, area.right) ? area : optimize(area.left);
		case 'inverse':
			return area.operand.kind === 'inverse' ? optimize(area.operand.operand) : area;
	}
}

export function add(left: GeoArea, right: GeoArea): GeoArea {
	return optimize(new Union(left, right));
}

export function fromAreas(areas: readonly GeoArea[]): GeoArea {
	const [first, ...rest] = areas;
	if (!first) {
		throw new GeoArgumentError('fromAreas() requires at least one area.', {
			argument: 'areas',
			value: areas
		});
	}
	return rest.reduce<GeoArea>((result, area) => add(result, area), first);
}

export function isAreaEqual(a: GeoArea, b: GeoArea): boolean {
	if (a === b) {
		return true;
	}
	switch (a.kind) {
		case 'rectangle':
			return b.kind === 'rectangle' && a.isEqual(b);
		case 'circle':
			return b.kind === 'circle' && a.isEqual(b);
		case 'inverse':
			return b.kind === 'inverse' && isAreaEqual(a.operand, b.operand);
		case 'union':
			return b.kind === 'union' && operandsEqual(a, b);
		case 'intersection':
			return b.kind === 'intersection' && operandsEqual(a, b);
		case 'difference':
			return b.kind === 'difference' && operandsEqual(a, b);
	}
}

function operandsEqual(a: Union | Intersection | Difference, b: Union | Intersection | Difference): boolean {
	return isAreaEqual(a.left, b.left) && isAreaEqual(a.right, b.right);
}

export function areaHashCode(area: GeoArea): number {
	switch (area.kind) {
		case 'rectangle':
		case 'circle':
			return area.hashCode();
		case 'inverse':
			return hashCodeOf(area.kind, areaHashCode(area.operand));
		case 'union':
		case 'intersection':
		case 'difference':
			return hashCodeOf(area.kind, areaHashCode(area.left), areaHashCode(area.right));
	}
}
