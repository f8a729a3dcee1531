import fs from 'fs-extra';
import path from 'path';
import { ENV } from './env';
import { runCommand } from './exec';
import { FFMPEG_BASE_ARGS } from './ffmpeg';
import { ToolError, describeError } from './errors';
import { debug, startStep } from './log';
import { ClipSplitter, Scene } from './types';

/** `{stem}_scene_{NNN}.mp4`, NNN being the 1-based scene number. */
export function clipFileName(stem: string, sceneNumber: number): string {
    return `${stem}_scene_${String(sceneNumber).padStart(3, '0')}.mp4`;
}

export function splitArgs(videoPath: string, scene: Scene, outPath: string): string[] {
    const duration = scene.end_time - scene.start_time;
    return [
        ...FFMPEG_BASE_ARGS,
        '-ss',
        String(scene.start_time),
        '-i',
        videoPath,
        '-t',
        String(duration),
        '-map',
        '0:v:0',
        '-map',
        '0:a?',
        '-c:v',
        'libx264',
        '-preset',
        'veryfast',
        '-crf',
        '22',
        '-c:a',
        'aac',
        '-sn',
        outPath,
    ];
}

export function createFfmpegSplitter(ffmpegBin = ENV.ffmpegBin): ClipSplitter {
    return {
        async split(videoPath: string, scenes: Scene[], outDir: string, stem: string): Promise<string[]> {
            await fs.ensureDir(outDir);
            const produced: string[] = [];
            const timer = startStep('split.clips', { videoPath, scenes: scenes.length });
            for (const [i, scene] of scenes.entries()) {
                const outPath = path.join(outDir, clipFileName(stem, i + 1));
                if (scene.end_time - scene.start_time <= 0) {
                    debug('split.skip.empty', { videoPath, sceneId: scene.scene_id });
                    continue;
                }
                try {
                    await runCommand(ffmpegBin, splitArgs(videoPath, scene, outPath));
                } catch (e) {
                    throw new ToolError(
                        `ffmpeg failed while cutting scene ${scene.scene_id} ` +
                            `(${scene.start_time}s-${scene.end_time}s) of ${videoPath}: ${describeError(e)}`,
                        ffmpegBin,
                        e instanceof ToolError ? e.exitCode : undefined,
                        e instanceof ToolError ? e.stderr : undefined
                    );
                }
                produced.push(outPath);
                timer.eta(i + 1, scenes.length);
            }
            timer.end({ produced: produced.length });
            return produced;
        },
    };
}
