import type { MultiPolygon, Polygon, Position } from 'geojson';
import type { Bounds } from '../types';

type Point = [number, number];

/**
 * Unsigned shoelace area in squared degrees.
 */
export function ringArea(ring: readonly Position[]): number {
    let twice = 0;
    for (let i = 0; i < ring.length; i++) {
        const [x1, y1] = ring[i];
        const [x2, y2] = ring[(i + 1) % ring.length];
        twice += x1 * y2 - x2 * y1;
    }
    return Math.abs(twice) / 2;
}

const openRing = (ring: readonly Position[]): Point[] => {
    const pts: Point[] = ring.map(p => [p[0], p[1]]);
    if (pts.length > 1) {
        const [fx, fy] = pts[0];
        const [lx, ly] = pts[pts.length - 1];
        if (fx === lx && fy === ly) pts.pop();
    }
    return pts;
};

type Edge = {
    inside: (p: Point) => boolean;
    cross: (a: Point, b: Point) => Point;
};

const rectEdges = (b: Bounds): Edge[] => [
    {
        inside: p => p[0] >= b.west,
        cross: (a, c) => [b.west, a[1] + ((c[1] - a[1]) * (b.west - a[0])) / (c[0] - a[0])],
    },
    {
        inside: p => p[0] <= b.east,
        cross: (a, c) => [b.east, a[1] + ((c[1] - a[1]) * (b.east - a[0])) / (c[0] - a[0])],
    },
    {
        inside: p => p[1] >= b.south,
        cross: (a, c) => [a[0] + ((c[0] - a[0]) * (b.south - a[1])) / (c[1] - a[1]), b.south],
    },
    {
        inside: p => p[1] <= b.north,
        cross: (a, c) => [a[0] + ((c[0] - a[0]) * (b.north - a[1])) / (c[1] - a[1]), b.north],
    },
];

/**
 * Sutherland–Hodgman clip of a ring against an axis-aligned rectangle.
 * The clip window is convex, so the area of the result is exact even for
 * concave rings (degenerate zero-width seams contribute no area).
 */
export function clipRing(ring: readonly Position[], bounds: Bounds): Point[] {
    let output = openRing(ring);
    for (const edge of rectEdges(bounds)) {
        if (output.length === 0) break;
        const input = output;
        output = [];
        for (let i = 0; i < input.length; i++) {
            const current = input[i];
            const prev = input[(i + input.length - 1) % input.length];
            const curIn = edge.inside(current);
            const prevIn = edge.inside(prev);
            if (curIn) {
                if (!prevIn) output.push(edge.cross(prev, current));
                output.push(current);
            } else if (prevIn) {
                output.push(edge.cross(prev, current));
            }
        }
    }
    return output;
}

const polygonsOf = (geometry: Polygon | MultiPolygon): Position[][][] =>
    geometry.type === 'Polygon' ? [geometry.coordinates] : geometry.coordinates;

export function geometryBounds(geometry: Polygon | MultiPolygon): Bounds | null {
    let west = Infinity;
    let south = Infinity;
    let east = -Infinity;
    let north = -Infinity;
    for (const polygon of polygonsOf(geometry)) {
        for (const [x, y] of polygon[0] ?? []) {
            if (x < west) west = x;
            if (x > east) east = x;
            if (y < south) south = y;
            if (y > north) north = y;
        }
    }
    return Number.isFinite(west) ? { west, south, east, north } : null;
}

export const boundsIntersect = (a: Bounds, b: Bounds): boolean =>
    a.west < b.east && b.west < a.east && a.south < b.north && b.south < a.north;

/**
 * Area of the polygon inside `bounds` (outer rings minus holes), squared degrees.
 */
export function overlapArea(geometry: Polygon | MultiPolygon, bounds: Bounds): number {
    let area = 0;
    for (const [outer, ...holes] of polygonsOf(geometry)) {
        if (!outer) continue;
        let part = ringArea(clipRing(outer, bounds));
        for (const hole of holes) {
            part -= ringArea(clipRing(hole, bounds));
        }
        area += Math.max(0, part);
    }
    return area;
}

/**
 * Fraction (0..1) of the rectangle covered by the polygon.
 */
export function coverageFraction(geometry: Polygon | MultiPolygon, cell: Bounds): number {
    const cellArea = (cell.east - cell.west) * (cell.north - cell.south);
    if (cellArea <= 0) return 0;
    return Math.min(1, overlapArea(geometry, cell) / cellArea);
}
