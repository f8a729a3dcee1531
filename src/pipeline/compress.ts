import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { ENV } from './env';
import { runCommand } from './exec';
import { describeError } from './errors';
import { info, warn, startStep } from './log';

export type CompressStatus = 'skipped' | 'gpu' | 'cpu' | 'error';

export interface CompressResult {
    file: string;
    status: CompressStatus;
    error?: string;
}

export interface CompressOptions {
    inputDir: string;
    outputDir: string;
    workers?: number;
    crf?: number;
    ffmpegBin?: string;
}

export interface CompressSummary {
    results: CompressResult[];
    counts: Record<CompressStatus, number>;
}

const AUDIO_ARGS = ['-c:a', 'aac', '-b:a', '128k'];

export function gpuEncodeArgs(input: string, output: string, crf: number): string[] {
    return [
        '-hwaccel', 'cuda',
        '-i', input,
        '-c:v', 'h264_nvenc',
        '-preset', 'p4',
        '-crf', String(crf),
        ...AUDIO_ARGS,
        '-y',
        output,
    ];
}

export function cpuEncodeArgs(input: string, output: string, crf: number): string[] {
    return [
        '-i', input,
        '-c:v', 'libx264',
        '-preset', 'veryfast',
        '-crf', String(crf),
        ...AUDIO_ARGS,
        '-y',
        output,
    ];
}

/** Encodes one file: NVENC first, libx264 when the GPU path fails. Never throws. */
export async function compressVideo(
    file: string,
    opts: CompressOptions
): Promise<CompressResult> {
    const input = path.join(opts.inputDir, file);
    const output = path.join(opts.outputDir, file);
    if (await fs.pathExists(output)) {
        return { file, status: 'skipped' };
    }
    const ffmpegBin = opts.ffmpegBin ?? ENV.ffmpegBin;
    const crf = opts.crf ?? ENV.compressCrf;
    try {
        await runCommand(ffmpegBin, gpuEncodeArgs(input, output, crf));
        return { file, status: 'gpu' };
    } catch (gpuErr) {
        warn('compress.gpu.fail', { file, error: describeError(gpuErr) });
    }
    try {
        await runCommand(ffmpegBin, cpuEncodeArgs(input, output, crf));
        return { file, status: 'cpu' };
    } catch (cpuErr) {
        return { file, status: 'error', error: describeError(cpuErr) };
    }
}

export async function listVideos(inputDir: string): Promise<string[]> {
    const entries = await fs.readdir(inputDir);
    return entries.filter((f) => f.endsWith('.mp4')).sort();
}

export async function compressDirectory(opts: CompressOptions): Promise<CompressSummary> {
    await fs.ensureDir(opts.outputDir);
    const files = await listVideos(opts.inputDir);
    const concurrency = Math.max(1, Math.min(opts.workers ?? ENV.compressWorkers, os.cpus().length));
    info('compress.start', { inputDir: opts.inputDir, outputDir: opts.outputDir, files: files.length, concurrency });

    const results: CompressResult[] = new Array(files.length);
    const queue = files.map((file, index) => ({ file, index }));
    let done = 0;
    const timer = startStep('compress.videos', { total: files.length });

    async function worker() {
        while (queue.length) {
            const next = queue.shift();
            if (!next) break;
            const result = await compressVideo(next.file, opts);
            results[next.index] = result;
            if (result.status === 'error') {
                warn('compress.fail', { file: result.file, error: result.error });
            }
            done += 1;
            timer.eta(done, files.length);
        }
    }

    const workers: Promise<void>[] = [];
    for (let i = 0; i < concurrency; i++) workers.push(worker());
    await Promise.all(workers);

    const counts: Record<CompressStatus, number> = { skipped: 0, gpu: 0, cpu: 0, error: 0 };
    for (const r of results) counts[r.status] += 1;
    timer.end(counts);
    return { results, counts };
}
