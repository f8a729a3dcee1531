import { ENV } from './env';
import { runCommand } from './exec';
import { ToolError } from './errors';
import { VideoProbe } from './types';

/** Parses ffprobe rates such as "30000/1001" or "25". Returns NaN for "0/0" and garbage. */
export function parseFrameRate(raw: unknown): number {
    if (typeof raw !== 'string' || !raw.trim()) return NaN;
    const [num, den] = raw.split('/');
    const n = Number(num);
    const d = den === undefined ? 1 : Number(den);
    if (!isFinite(n) || !isFinite(d) || d === 0 || n <= 0) return NaN;
    return n / d;
}

function field(obj: unknown, key: string): unknown {
    return typeof obj === 'object' && obj !== null && key in obj ? Reflect.get(obj, key) : undefined;
}

function positiveInt(raw: unknown): number | undefined {
    const n = typeof raw === 'string' || typeof raw === 'number' ? Number(raw) : NaN;
    return Number.isInteger(n) && n > 0 ? n : undefined;
}

export function parseProbeOutput(stdout: string, videoPath: string): VideoProbe {
    let json: unknown;
    try {
        json = JSON.parse(stdout);
    } catch {
        throw new ToolError(`ffprobe returned invalid JSON for ${videoPath}`, 'ffprobe', undefined, stdout.slice(-400));
    }
    const streams = field(json, 'streams');
    const stream: unknown = Array.isArray(streams) ? streams[0] : undefined;
    if (!stream) {
        throw new ToolError(`No video stream found in ${videoPath}`, 'ffprobe');
    }
    let fps = parseFrameRate(field(stream, 'r_frame_rate'));
    if (Number.isNaN(fps)) fps = parseFrameRate(field(stream, 'avg_frame_rate'));
    if (Number.isNaN(fps)) {
        throw new ToolError(`ffprobe could not determine frame rate for ${videoPath}`, 'ffprobe');
    }
    const durationSec = Number(field(field(json, 'format'), 'duration'));
    const totalFrames =
        positiveInt(field(stream, 'nb_read_packets')) ??
        positiveInt(field(stream, 'nb_frames')) ??
        (isFinite(durationSec) ? Math.round(durationSec * fps) : 0);
    return {
        fps,
        totalFrames,
        width: positiveInt(field(stream, 'width')) ?? 0,
        height: positiveInt(field(stream, 'height')) ?? 0,
        durationSec: isFinite(durationSec) ? durationSec : totalFrames / fps,
    };
}

export async function probeVideo(videoPath: string, ffprobeBin = ENV.ffprobeBin): Promise<VideoProbe> {
    const { stdout } = await runCommand(ffprobeBin, [
        '-v',
        'error',
        '-select_streams',
        'v:0',
        '-count_packets',
        '-show_entries',
        'stream=width,height,r_frame_rate,avg_frame_rate,nb_frames,nb_read_packets:format=duration',
        '-of',
        'json',
        videoPath,
    ]);
    return parseProbeOutput(stdout, videoPath);
}
