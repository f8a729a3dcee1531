import fs from 'fs-extra';
import path from 'path';
import { ManifestError } from './errors';
import { info, debug } from './log';
import { DatasetRecord, ResolvedEntry } from './types';

export interface LoadedDataset {
    entries: ResolvedEntry[];
    found: number;
    total: number;
}

function isDatasetRecord(value: unknown): value is DatasetRecord {
    return (
        typeof value === 'object' &&
        value !== null &&
        'video' in value &&
        typeof value.video === 'string'
    );
}

export async function loadManifest(manifestPath: string): Promise<DatasetRecord[]> {
    let parsed: unknown;
    try {
        parsed = await fs.readJson(manifestPath);
    } catch (e) {
        throw new ManifestError(
            `Could not read manifest ${manifestPath}: ${e instanceof Error ? e.message : String(e)}`,
            { manifestPath }
        );
    }
    if (!Array.isArray(parsed)) {
        throw new ManifestError(`Manifest ${manifestPath} must be a JSON array`, { manifestPath });
    }
    return parsed.map((item: unknown, index) => {
        if (!isDatasetRecord(item)) {
            throw new ManifestError(
                `Manifest entry ${index} has no string "video" field`,
                { manifestPath, index }
            );
        }
        return { video: item.video };
    });
}

/** An absolute `video` value is used as is; a relative one is joined under `videoDir`. */
export function videoPathFor(videoDir: string, video: string): string {
    return path.isAbsolute(video) ? video : path.join(videoDir, video);
}

export async function resolveEntries(
    records: DatasetRecord[],
    videoDir: string
): Promise<ResolvedEntry[]> {
    const out: ResolvedEntry[] = [];
    for (const record of records) {
        const videoPath = videoPathFor(videoDir, record.video);
        if (await fs.pathExists(videoPath)) {
            out.push({ status: 'found', filename: record.video, path: videoPath });
        } else {
            debug('dataset.missing', { video: record.video, path: videoPath });
            out.push({ status: 'missing', filename: record.video, path: videoPath });
        }
    }
    return out;
}

export async function loadDataset(manifestPath: string, videoDir: string): Promise<LoadedDataset> {
    const records = await loadManifest(manifestPath);
    const entries = await resolveEntries(records, videoDir);
    const found = entries.filter((e) => e.status === 'found').length;
    info('dataset.loaded', { manifestPath, videoDir, total: records.length, found });
    return { entries, found, total: records.length };
}
