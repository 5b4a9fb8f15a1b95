import fs from 'fs';
import path from 'path';
import { mapArtifactName, rankingArtifactName } from '../constants';
import { WriteFailure, describeError } from '../errors';
import type { RankedCountry } from '../types';

const CSV_HEADER = 'country,avg_wind_power_density,rank';

const csvField = (value: string): string =>
    /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;

export function rankingsToCsv(rankings: readonly RankedCountry[]): string {
    const lines = rankings.map(r => [csvField(r.country), String(r.avg_wind_power_density), String(r.rank)].join(','));
    return [CSV_HEADER, ...lines].join('\n') + '\n';
}

export function artifactPaths(plotsDir: string, date: string, cycle: string) {
    return {
        map: path.join(plotsDir, mapArtifactName(date, cycle)),
        rankings: path.join(plotsDir, rankingArtifactName(date, cycle)),
    };
}

export function writeArtifact(filePath: string, contents: string | Buffer): void {
    try {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.writeFileSync(filePath, contents);
    } catch (e) {
        throw new WriteFailure(`Failed to write ${filePath}: ${describeError(e)}`, { context: { filePath }, cause: e });
    }
}
