import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { ENV } from './env';
import { runFirstAvailable, toolCandidates } from './exec';
import { ToolError, describeError } from './errors';
import { probeVideo } from './probe';
import { info, warn } from './log';
import {
    DetectionResult,
    Scene,
    SceneBoundary,
    SceneDetector,
    VideoMetadata,
    VideoProbe,
} from './types';

const SCENE_CSV = 'scenes.csv';

export interface PySceneDetectOptions {
    bin?: string;
    pythonBin?: string;
    ffprobeBin?: string;
}

export type DetectOutcome =
    | { ok: true; metadata: VideoMetadata; result: DetectionResult }
    | { ok: false; error: string };

/**
 * Reads the `list-scenes` CSV written by PySceneDetect. Frame columns there are
 * 1-based and inclusive; boundaries returned here are 0-based with an exclusive end.
 */
export function parseSceneListCsv(csv: string): SceneBoundary[] {
    const lines = csv
        .split(/\r?\n/)
        .map((l) => l.trim())
        .filter(Boolean);
    const headerIdx = lines.findIndex((l) => l.startsWith('Scene Number'));
    if (headerIdx < 0) return [];
    const header = lines[headerIdx].split(',');
    const col = (name: string) => {
        const i = header.indexOf(name);
        if (i < 0) throw new ToolError(`Scene list is missing column "${name}"`, 'scenedetect');
        return i;
    };
    const startFrameCol = col('Start Frame');
    const lengthCol = col('Length (frames)');
    const startTimeCol = col('Start Time (seconds)');
    const endTimeCol = col('End Time (seconds)');

    return lines.slice(headerIdx + 1).map((line) => {
        const cells = line.split(',');
        const startFrame = Number(cells[startFrameCol]) - 1;
        const length = Number(cells[lengthCol]);
        const startTime = Number(cells[startTimeCol]);
        const endTime = Number(cells[endTimeCol]);
        if (![startFrame, length, startTime, endTime].every(isFinite)) {
            throw new ToolError(`Unparseable scene list row: ${line}`, 'scenedetect');
        }
        return { startFrame, endFrame: startFrame + length, startTime, endTime };
    });
}

/** A video without any detected cut is one scene spanning every frame. */
export function wholeVideoIfEmpty(scenes: SceneBoundary[], probe: VideoProbe): SceneBoundary[] {
    if (scenes.length) return scenes;
    if (probe.totalFrames <= 0) {
        throw new ToolError('Video has no decodable frames', 'ffprobe');
    }
    return [
        {
            startFrame: 0,
            endFrame: probe.totalFrames,
            startTime: 0,
            endTime: probe.totalFrames / probe.fps,
        },
    ];
}

export function sceneDetectArgs(videoPath: string, outDir: string, threshold: number): string[] {
    return [
        '--input',
        videoPath,
        '--output',
        outDir,
        '--quiet',
        'detect-content',
        '--threshold',
        String(threshold),
        'list-scenes',
        '--filename',
        SCENE_CSV,
        '--skip-cuts',
    ];
}

export function createPySceneDetectDetector(opts: PySceneDetectOptions = {}): SceneDetector {
    const bin = opts.bin ?? ENV.scenedetectBin;
    const pythonBin = opts.pythonBin ?? ENV.scenedetectPythonBin;
    const ffprobeBin = opts.ffprobeBin ?? ENV.ffprobeBin;
    return {
        async detect(videoPath: string, threshold: number): Promise<DetectionResult> {
            const probe = await probeVideo(videoPath, ffprobeBin);
            const workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'scenedetect-'));
            try {
                const args = sceneDetectArgs(videoPath, workDir, threshold);
                await runFirstAvailable(
                    toolCandidates(bin, 'scenedetect', 'scenedetect', pythonBin, args),
                    'scenedetect'
                );
                const csvPath = path.join(workDir, SCENE_CSV);
                if (!(await fs.pathExists(csvPath))) {
                    throw new ToolError(`scenedetect did not write ${csvPath}`, 'scenedetect');
                }
                const scenes = wholeVideoIfEmpty(
                    parseSceneListCsv(await fs.readFile(csvPath, 'utf8')),
                    probe
                );
                return { fps: probe.fps, totalFrames: probe.totalFrames, scenes };
            } finally {
                await fs.remove(workDir);
            }
        },
    };
}

export function toScenes(boundaries: SceneBoundary[]): Scene[] {
    return boundaries.map((b, i) => ({
        scene_id: i,
        start_frame: b.startFrame,
        end_frame: b.endFrame,
        start_time: b.startTime,
        end_time: b.endTime,
    }));
}

export function buildVideoMetadata(
    videoPath: string,
    threshold: number,
    result: DetectionResult
): VideoMetadata {
    const scenes = toScenes(result.scenes);
    return {
        video_path: videoPath,
        fps: result.fps,
        threshold,
        num_scenes: scenes.length,
        scenes,
    };
}

/** Runs the detector for one video. Never throws: failures come back as `{ ok: false }`. */
export async function detectScenes(
    videoPath: string,
    threshold: number,
    detector: SceneDetector
): Promise<DetectOutcome> {
    info('detect.start', { videoPath, threshold });
    try {
        const result = await detector.detect(videoPath, threshold);
        const metadata = buildVideoMetadata(videoPath, threshold, result);
        info('detect.done', { videoPath, scenes: metadata.num_scenes, fps: metadata.fps });
        return { ok: true, metadata, result };
    } catch (e) {
        const error = describeError(e);
        warn('detect.fail', { videoPath, error });
        return { ok: false, error };
    }
}
