import { PNG } from 'pngjs';
import { describe, expect, it } from 'vitest';
import { PngMapRenderer, colourAt, valueRange } from '../services/mapRenderer';
import { buildRaster, rasterAxes } from '../services/raster';
import { ALPLAND, sample } from './fixtures';

const pixel = (png: PNG, x: number, y: number) => {
    const idx = (png.width * y + x) << 2;
    return [png.data[idx], png.data[idx + 1], png.data[idx + 2]];
};

describe('colourAt', () => {
    it('interpolates the viridis anchors', () => {
        expect(colourAt(0)).toEqual([68, 1, 84]);
        expect(colourAt(0.5)).toEqual([33, 145, 140]);
        expect(colourAt(1)).toEqual([253, 231, 37]);
        expect(colourAt(2)).toEqual([253, 231, 37]);
        expect(colourAt(Number.NaN)).toEqual([68, 1, 84]);
    });
});

describe('PngMapRenderer', () => {
    // lats [50], lons [10, 12.5] -> extent 8.75..13.75 x 48.75..51.25
    const day1 = [sample(50, 10, 0, 100), sample(50, 12.5, 0, 300)];
    const day2 = [sample(50, 10, 24, null), sample(50, 12.5, 24, 200)];
    const axes = rasterAxes([...day1, ...day2], 2.5);
    const rasters = [buildRaster(day1, axes, '2025-08-07'), buildRaster(day2, axes, '2025-08-08')];

    it('shares one value range across panels', () => {
        expect(valueRange(rasters)).toEqual({ min: 100, max: 300 });
        expect(valueRange([])).toBeNull();
    });

    it('lays panels side by side with a legend strip', () => {
        const png = PNG.sync.read(new PngMapRenderer().render(rasters, []));
        // 60x30 panels, 8px gap, 8px gap + 10px legend below
        expect(png.width).toBe(128);
        expect(png.height).toBe(48);

        expect(pixel(png, 0, 0)).toEqual([68, 1, 84]);
        expect(pixel(png, 45, 15)).toEqual([253, 231, 37]);
        expect(pixel(png, 64, 15)).toEqual([255, 255, 255]);
        expect(pixel(png, 70, 15)).toEqual([230, 230, 230]);
        expect(pixel(png, 100, 15)).toEqual([33, 145, 140]);
        expect(pixel(png, 0, 45)).toEqual([68, 1, 84]);
    });

    it('draws country outlines inside each panel', () => {
        const png = PNG.sync.read(new PngMapRenderer().render(rasters, [ALPLAND]));
        // Alpland's north-west corner (9, 51) -> (3, 3) in the first panel, (71, 3) in the second
        expect(pixel(png, 3, 3)).toEqual([0, 0, 0]);
        expect(pixel(png, 71, 3)).toEqual([0, 0, 0]);
        expect(pixel(png, 10, 15)).toEqual([68, 1, 84]);
    });

    it('renders a placeholder when there is nothing to draw', () => {
        const png = PNG.sync.read(new PngMapRenderer().render([], []));
        expect([png.width, png.height]).toEqual([1, 1]);
    });
});
