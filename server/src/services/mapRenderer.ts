import type { Position } from 'geojson';
import { PNG } from 'pngjs';
import type { Bounds, CountryPolygon, RasterSnapshot } from '../types';
import { rasterExtent } from './raster';

export interface MapRenderer {
    render(rasters: readonly RasterSnapshot[], countries: readonly CountryPolygon[]): Buffer;
}

type Rgb = [number, number, number];

const VIRIDIS: Rgb[] = [
    [68, 1, 84],
    [59, 82, 139],
    [33, 145, 140],
    [94, 201, 98],
    [253, 231, 37],
];

const NO_DATA: Rgb = [230, 230, 230];
const BORDER: Rgb = [0, 0, 0];
const BACKGROUND: Rgb = [255, 255, 255];

/**
 * Viridis colour for t in [0, 1], linearly interpolated between anchors.
 */
export function colourAt(t: number): Rgb {
    const x = Math.min(1, Math.max(0, Number.isFinite(t) ? t : 0)) * (VIRIDIS.length - 1);
    const i = Math.min(VIRIDIS.length - 2, Math.floor(x));
    const f = x - i;
    const [a, b] = [VIRIDIS[i], VIRIDIS[i + 1]];
    return [
        Math.round(a[0] + (b[0] - a[0]) * f),
        Math.round(a[1] + (b[1] - a[1]) * f),
        Math.round(a[2] + (b[2] - a[2]) * f),
    ];
}

export function valueRange(rasters: readonly RasterSnapshot[]): { min: number; max: number } | null {
    let min = Infinity;
    let max = -Infinity;
    for (const r of rasters) {
        for (const row of r.values) {
            for (const v of row) {
                if (v === null) continue;
                if (v < min) min = v;
                if (v > max) max = v;
            }
        }
    }
    return Number.isFinite(min) ? { min, max } : null;
}

export interface PngMapOptions {
    pixelsPerDegree?: number;
    gap?: number;
    legendHeight?: number;
}

/**
 * Faceted PNG: one panel per raster, side by side, sharing one colour scale,
 * with country outlines drawn on top and a gradient strip underneath.
 */
export class PngMapRenderer implements MapRenderer {
    private readonly ppd: number;
    private readonly gap: number;
    private readonly legendHeight: number;

    constructor(options: PngMapOptions = {}) {
        this.ppd = options.pixelsPerDegree ?? 12;
        this.gap = options.gap ?? 8;
        this.legendHeight = options.legendHeight ?? 10;
    }

    panelSize(extent: Bounds): { width: number; height: number } {
        return {
            width: Math.max(1, Math.ceil((extent.east - extent.west) * this.ppd)),
            height: Math.max(1, Math.ceil((extent.north - extent.south) * this.ppd)),
        };
    }

    render(rasters: readonly RasterSnapshot[], countries: readonly CountryPolygon[]): Buffer {
        const extent = rasters.length > 0 ? rasterExtent(rasters[0]) : null;
        if (!extent) {
            const empty = new PNG({ width: 1, height: 1 });
            fill(empty, 0, 0, 1, 1, NO_DATA);
            return PNG.sync.write(empty);
        }

        const panel = this.panelSize(extent);
        const width = rasters.length * panel.width + (rasters.length - 1) * this.gap;
        const height = panel.height + this.gap + this.legendHeight;
        const png = new PNG({ width, height });
        fill(png, 0, 0, width, height, BACKGROUND);

        const range = valueRange(rasters);
        const span = range && range.max > range.min ? range.max - range.min : 1;

        rasters.forEach((raster, index) => {
            const offsetX = index * (panel.width + this.gap);
            const toX = (lon: number) => offsetX + Math.floor((lon - extent.west) * this.ppd);
            const toY = (lat: number) => Math.floor((extent.north - lat) * this.ppd);

            raster.lats.forEach((lat, i) => {
                raster.lons.forEach((lon, j) => {
                    const value = raster.values[i][j];
                    const colour = value === null || !range ? NO_DATA : colourAt((value - range.min) / span);
                    const x0 = toX(lon - raster.lonStep / 2);
                    const x1 = toX(lon + raster.lonStep / 2);
                    const y0 = toY(lat + raster.latStep / 2);
                    const y1 = toY(lat - raster.latStep / 2);
                    fill(png, x0, y0, Math.min(x1, offsetX + panel.width), Math.min(y1, panel.height), colour);
                });
            });

            const clip = { left: offsetX, top: 0, right: offsetX + panel.width - 1, bottom: panel.height - 1 };
            for (const country of countries) {
                for (const ring of outerRings(country)) {
                    for (let k = 1; k < ring.length; k++) {
                        line(
                            png,
                            toX(ring[k - 1][0]), toY(ring[k - 1][1]),
                            toX(ring[k][0]), toY(ring[k][1]),
                            clip
                        );
                    }
                }
            }
        });

        const legendTop = panel.height + this.gap;
        for (let x = 0; x < width; x++) {
            fill(png, x, legendTop, x + 1, height, colourAt(width > 1 ? x / (width - 1) : 0));
        }
        return PNG.sync.write(png);
    }
}

const outerRings = (country: CountryPolygon): Position[][] =>
    country.geometry.type === 'Polygon'
        ? country.geometry.coordinates.slice(0, 1)
        : country.geometry.coordinates.map(p => p[0]).filter(r => r !== undefined);

function setPixel(png: PNG, x: number, y: number, [r, g, b]: Rgb) {
    if (x < 0 || y < 0 || x >= png.width || y >= png.height) return;
    const idx = (png.width * y + x) << 2;
    png.data[idx] = r;
    png.data[idx + 1] = g;
    png.data[idx + 2] = b;
    png.data[idx + 3] = 255;
}

function fill(png: PNG, x0: number, y0: number, x1: number, y1: number, colour: Rgb) {
    for (let y = Math.max(0, y0); y < Math.min(png.height, y1); y++) {
        for (let x = Math.max(0, x0); x < Math.min(png.width, x1); x++) {
            setPixel(png, x, y, colour);
        }
    }
}

interface Clip {
    left: number;
    top: number;
    right: number;
    bottom: number;
}

// Bresenham; pixels outside the panel are dropped
function line(png: PNG, x0: number, y0: number, x1: number, y1: number, clip: Clip) {
    const dx = Math.abs(x1 - x0);
    const dy = -Math.abs(y1 - y0);
    const sx = x0 < x1 ? 1 : -1;
    const sy = y0 < y1 ? 1 : -1;
    let err = dx + dy;
    let x = x0;
    let y = y0;
    for (;;) {
        if (x >= clip.left && x <= clip.right && y >= clip.top && y <= clip.bottom) {
            setPixel(png, x, y, BORDER);
        }
        if (x === x1 && y === y1) break;
        const e2 = 2 * err;
        if (e2 >= dy) {
            err += dy;
            x += sx;
        }
        if (e2 <= dx) {
            err += dx;
            y += sy;
        }
    }
}
