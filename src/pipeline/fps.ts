import fs from 'fs-extra';
import path from 'path';
import { ENV } from './env';
import { runCommand } from './exec';
import { ConfigError } from './errors';
import { FFMPEG_BASE_ARGS, escapeFilterValue, retimeFilter } from './ffmpeg';
import { probeVideo } from './probe';
import { info } from './log';

export interface FpsResult {
    outputPath: string;
    inputFps: number;
    outputFps: number;
    /** Frames written to the output */
    frames: number;
}

function assertFps(fps: number): void {
    if (!isFinite(fps) || fps <= 0) {
        throw new ConfigError(`Output fps must be a positive number, got ${fps}`, { fps });
    }
}

const VIDEO_OUT_ARGS = ['-an', '-c:v', 'libx264', '-pix_fmt', 'yuv420p'];

/**
 * Keeps every frame and plays them back at `fps`, so the duration scales by
 * sourceFps / fps.
 */
export async function changeFps(
    inputPath: string,
    outputPath: string,
    fps: number,
    ffmpegBin = ENV.ffmpegBin
): Promise<FpsResult> {
    assertFps(fps);
    const probe = await probeVideo(inputPath);
    await fs.ensureDir(path.dirname(outputPath));
    await runCommand(ffmpegBin, [
        ...FFMPEG_BASE_ARGS,
        '-i',
        inputPath,
        '-vf',
        retimeFilter(fps),
        '-r',
        String(fps),
        ...VIDEO_OUT_ARGS,
        outputPath,
    ]);
    info('fps.change.done', { inputPath, outputPath, inputFps: probe.fps, outputFps: fps });
    return { outputPath, inputFps: probe.fps, outputFps: fps, frames: probe.totalFrames };
}

/** Source frame indices kept when taking `outputFps` out of `inputFps`: floor(i * step). */
export function subsampleIndices(totalFrames: number, inputFps: number, outputFps: number): number[] {
    const step = inputFps / outputFps;
    const count = Math.floor(totalFrames / step);
    const out: number[] = [];
    for (let i = 0; i < count; i++) {
        const idx = Math.floor(i * step);
        if (idx < totalFrames) out.push(idx);
    }
    return out;
}

/**
 * ffmpeg `select` expression true exactly for the frames of `subsampleIndices`:
 * frame n is kept when n == floor(ceil(n / step) * step) and ceil(n / step) < count.
 */
export function subsampleSelectExpr(totalFrames: number, inputFps: number, outputFps: number): string {
    const step = inputFps / outputFps;
    const count = Math.floor(totalFrames / step);
    return `eq(n,floor(ceil(n/${step})*${step}))*lt(ceil(n/${step}),${count})`;
}

/** Drops frames so the source is sampled at `fps`; only lowers the rate. */
export async function subsampleVideo(
    inputPath: string,
    outputPath: string,
    fps: number,
    ffmpegBin = ENV.ffmpegBin
): Promise<FpsResult> {
    assertFps(fps);
    const probe = await probeVideo(inputPath);
    if (fps > probe.fps) {
        throw new ConfigError(
            `Cannot subsample ${inputPath} from ${probe.fps} fps up to ${fps} fps; use changeFps instead`,
            { inputFps: probe.fps, outputFps: fps }
        );
    }
    const frames = subsampleIndices(probe.totalFrames, probe.fps, fps).length;
    const select = escapeFilterValue(subsampleSelectExpr(probe.totalFrames, probe.fps, fps));
    await fs.ensureDir(path.dirname(outputPath));
    await runCommand(ffmpegBin, [
        ...FFMPEG_BASE_ARGS,
        '-i',
        inputPath,
        '-vf',
        `select=${select},${retimeFilter(fps)}`,
        '-r',
        String(fps),
        ...VIDEO_OUT_ARGS,
        outputPath,
    ]);
    info('fps.subsample.done', { inputPath, outputPath, inputFps: probe.fps, outputFps: fps, frames });
    return { outputPath, inputFps: probe.fps, outputFps: fps, frames };
}
