import type { MultiPolygon, Polygon } from 'geojson';
import { describe, expect, it } from 'vitest';
import { boundsIntersect, clipRing, coverageFraction, geometryBounds, overlapArea, ringArea } from '../services/geometry';
import { box } from './fixtures';

const cell = (west: number, south: number, east: number, north: number) => ({ west, south, east, north });

describe('ringArea', () => {
    it('is independent of winding and closing point', () => {
        expect(ringArea([[0, 0], [2, 0], [2, 2], [0, 2], [0, 0]])).toBe(4);
        expect(ringArea([[0, 0], [0, 2], [2, 2], [2, 0]])).toBe(4);
    });
});

describe('clipRing', () => {
    it('clips a square to the overlapping quarter', () => {
        const clipped = clipRing(box(0, 0, 2, 2).coordinates[0], cell(1, 1, 3, 3));
        expect(ringArea(clipped)).toBeCloseTo(1, 10);
    });

    it('returns nothing for disjoint rectangles', () => {
        expect(clipRing(box(0, 0, 1, 1).coordinates[0], cell(5, 5, 6, 6))).toEqual([]);
    });

    it('keeps concave rings exact', () => {
        // L-shape of area 3 inside the 2x2 square
        const l = [[0, 0], [2, 0], [2, 1], [1, 1], [1, 2], [0, 2], [0, 0]];
        expect(ringArea(clipRing(l, cell(0, 0, 2, 2)))).toBeCloseTo(3, 10);
        expect(ringArea(clipRing(l, cell(1, 1, 2, 2)))).toBeCloseTo(0, 10);
    });
});

describe('overlapArea / coverageFraction', () => {
    it('subtracts holes', () => {
        const donut: Polygon = {
            type: 'Polygon',
            coordinates: [box(0, 0, 4, 4).coordinates[0], box(1, 1, 3, 3).coordinates[0]],
        };
        expect(overlapArea(donut, cell(0, 0, 4, 4))).toBeCloseTo(12, 10);
        expect(coverageFraction(donut, cell(0, 0, 4, 4))).toBeCloseTo(0.75, 10);
        expect(coverageFraction(donut, cell(1.5, 1.5, 2.5, 2.5))).toBe(0);
    });

    it('sums the parts of a multipolygon', () => {
        const islands: MultiPolygon = {
            type: 'MultiPolygon',
            coordinates: [box(0, 0, 1, 1).coordinates, box(2, 0, 3, 1).coordinates],
        };
        expect(coverageFraction(islands, cell(0, 0, 4, 1))).toBeCloseTo(0.5, 10);
    });

    it('caps coverage at 1 when the polygon contains the cell', () => {
        expect(coverageFraction(box(-10, -10, 10, 10), cell(0, 0, 1, 1))).toBe(1);
    });
});

describe('geometryBounds', () => {
    it('spans every outer ring', () => {
        const g: MultiPolygon = {
            type: 'MultiPolygon',
            coordinates: [box(0, 0, 1, 1).coordinates, box(5, -2, 6, 3).coordinates],
        };
        expect(geometryBounds(g)).toEqual({ west: 0, south: -2, east: 6, north: 3 });
        expect(geometryBounds({ type: 'MultiPolygon', coordinates: [] })).toBeNull();
    });

    it('treats touching edges as not intersecting', () => {
        expect(boundsIntersect(cell(0, 0, 1, 1), cell(1, 0, 2, 1))).toBe(false);
        expect(boundsIntersect(cell(0, 0, 1, 1), cell(0.5, 0.5, 2, 2))).toBe(true);
    });
});
