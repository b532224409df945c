import { GeoPoint } from './geo-point.js';
import { GeoRectangle, cellsOverlap } from './geo-rectangle.js';

// Cells are non-wrapped rectangles, as produced by GeoRectangle.split().

export function intersectCells(a: GeoRectangle, b: GeoRectangle): GeoRectangle | null {
	if (!cellsOverlap(a, b)) {
		return null;
	}
	return new GeoRectangle(
		new GeoPoint(Math.max(a.southWest.lat, b.southWest.lat), Math.max(a.southWest.lon, b.southWest.lon)),
		new GeoPoint(Math.min(a.northEast.lat, b.northEast.lat), Math.min(a.northEast.lon, b.northEast.lon))
	);
}

export function intersectAll(as: readonly GeoRectangle[], bs: readonly GeoRectangle[]): GeoRectangle[] {
	const out: GeoRectangle[] = [];
	for (const a of as) {
		for (const b of bs) {
			const cell = intersectCells(a, b);
			if (cell) {
				out.push(cell);
			}
		}
	}
	return out;
}

function cell(south: number, west: number, north: number, east: number): GeoRectangle {
	return new GeoRectangle(new GeoPoint(south, west), new GeoPoint(north, east));
}

/**
 * Parts of `a` outside `b`: at most a southern and a northern band plus a western and an
 * eastern strip. Parts share their edges with `b`.
 */
export function subtractCell(a: GeoRectangle, b: GeoRectangle): GeoRectangle[] {
	const overlap = intersectCells(a, b);
	if (!overlap) {
		return [a];
	}
	const out: GeoRectangle[] = [];
	const south = overlap.southWest.lat;
	const north = overlap.northEast.lat;
	if (a.southWest.lat < south) {
		out.push(cell(a.southWest.lat, a.southWest.lon, south, a.northEast.lon));
	}
	if (north < a.northEast.lat) {
		out.push(cell(north, a.southWest.lon, a.northEast.lat, a.northEast.lon));
	}
	if (a.southWest.lon < overlap.southWest.lon) {
		out.push(cell(south, a.southWest.lon, north, overlap.southWest.lon));
	}
	if (overlap.northEast.lon < a.northEast.lon) {
		out.push(cell(south, overlap.northEast.lon, north, a.northEast.lon));
	}
	return out;
}

export function subtractAll(cells: readonly GeoRectangle[], cutters: readonly GeoRectangle[]): GeoRectangle[] {
	let remaining: GeoRectangle[] = [...cells];
	for (const cutter of cutters) {
		remaining = remaining.flatMap((part) => subtractCell(part, cutter));
		if (remaining.length === 0) {
			break;
		}
	}
	return remaining;
}

export function anyCellsOverlap(as: readonly GeoRectangle[], bs: readonly GeoRectangle[]): boolean {
	return as.some((a) => bs.some((b) => cellsOverlap(a, b)));
}

/** True when the union of `cover` leaves nothing of any cell in `cells`. */
export function isCovered(cells: readonly GeoRectangle[], cover: readonly GeoRectangle[]): boolean {
	return subtractAll(cells, cover).length === 0;
}

export function boundingBoxOf(cells: readonly GeoRectangle[]): GeoRectangle | null {
	let box: GeoRectangle | null = null;
	for (const next of cells) {
		box = box === null ? next : box.grow(next);
	}
	return box;
}
