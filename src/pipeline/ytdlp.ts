import fs from 'fs-extra';
import path from 'path';
import { ENV } from './env';
import { runCommand, runFirstAvailable, toolCandidates } from './exec';
import { FFMPEG_BASE_ARGS } from './ffmpeg';
import { ToolError, describeError } from './errors';
import { info, warn } from './log';

export type DownloadResult =
    | { ok: true; url: string; output: string }
    | { ok: false; url: string; error: string };

export interface DownloadOptions {
    outputDir?: string;
    /** yt-dlp format selector */
    quality?: string;
    ytdlpBin?: string;
    pythonBin?: string;
}

export interface SegmentOptions {
    start: number;
    duration: number;
    outputPath: string;
    fps?: number;
    ytdlpBin?: string;
    pythonBin?: string;
    ffmpegBin?: string;
}

const INSTALL_HINT = 'yt-dlp not found. Please install it with: pip install yt-dlp';

function ytdlpCandidates(args: string[], bin?: string, pythonBin?: string) {
    return toolCandidates(bin ?? ENV.ytdlpBin, 'yt-dlp', 'yt_dlp', pythonBin ?? ENV.ytdlpPythonBin, args);
}

function failure(url: string, e: unknown): DownloadResult {
    const error = e instanceof ToolError && e.missing ? INSTALL_HINT : describeError(e);
    warn('download.fail', { url, error });
    return { ok: false, url, error };
}

export async function downloadVideo(url: string, opts: DownloadOptions = {}): Promise<DownloadResult> {
    const outputDir = opts.outputDir ?? 'downloads';
    await fs.ensureDir(outputDir);
    const output = path.join(outputDir, '%(title)s.%(ext)s');
    const args = ['-f', opts.quality ?? 'best', '-o', output, url];
    try {
        const res = await runFirstAvailable(ytdlpCandidates(args, opts.ytdlpBin, opts.pythonBin), 'yt-dlp');
        info('download.done', { url, outputDir, via: res.cmd });
        return { ok: true, url, output };
    } catch (e) {
        return failure(url, e);
    }
}

/**
 * Downloads `[start, start + duration)` of a video: yt-dlp resolves the direct media
 * URL (format 18) and ffmpeg reads just that range, re-encoding at `fps`.
 */
export async function downloadSegment(url: string, opts: SegmentOptions): Promise<DownloadResult> {
    await fs.ensureDir(path.dirname(opts.outputPath));
    let mediaUrl: string;
    try {
        const res = await runFirstAvailable(
            ytdlpCandidates(['-f', '18', '--get-url', url], opts.ytdlpBin, opts.pythonBin),
            'yt-dlp'
        );
        mediaUrl = res.stdout.split(/\r?\n/)[0]?.trim() ?? '';
    } catch (e) {
        return failure(url, e);
    }
    if (!mediaUrl) {
        return failure(url, new ToolError(`yt-dlp returned no media URL for ${url}`, 'yt-dlp'));
    }
    try {
        await runCommand(opts.ffmpegBin ?? ENV.ffmpegBin, [
            ...FFMPEG_BASE_ARGS,
            '-ss',
            String(opts.start),
            '-i',
            mediaUrl,
            '-t',
            String(opts.duration),
            '-c:v',
            'libx264',
            '-r',
            String(opts.fps ?? 25),
            '-fps_mode',
            'passthrough',
            opts.outputPath,
        ]);
    } catch (e) {
        return failure(url, e);
    }
    info('download.segment.done', { url, outputPath: opts.outputPath, start: opts.start, duration: opts.duration });
    return { ok: true, url, output: opts.outputPath };
}
