import { describe, it, expect, vi, beforeEach } from 'vitest';
import path from 'path';
import { downloadSegment, downloadVideo } from '../src/pipeline/ytdlp';
import { makeTempDir } from './helpers';

const { execaMock } = vi.hoisted(() => ({
  execaMock: vi.fn<(cmd: string, args: string[]) => Promise<{ stdout: string; stderr: string }>>(),
}));
vi.mock('execa', () => ({ execa: execaMock }));

const URL = 'https://www.youtube.com/watch?v=test-id';

describe('yt-dlp downloads', () => {
  let dir: string;

  beforeEach(async () => {
    execaMock.mockReset();
    dir = await makeTempDir();
  });

  it('downloads with the requested format into the output directory', async () => {
    execaMock.mockResolvedValue({ stdout: '', stderr: '' });

    const res = await downloadVideo(URL, { outputDir: dir, quality: 'worst', ytdlpBin: 'yt-dlp', pythonBin: '' });

    const output = path.join(dir, '%(title)s.%(ext)s');
    expect(res).toEqual({ ok: true, url: URL, output });
    expect(execaMock).toHaveBeenCalledTimes(1);
    expect(execaMock.mock.calls[0].slice(0, 2)).toEqual(['yt-dlp', ['-f', 'worst', '-o', output, URL]]);
  });

  it('tells the user how to install yt-dlp when no candidate exists', async () => {
    execaMock.mockRejectedValue(Object.assign(new Error('spawn ENOENT'), { code: 'ENOENT' }));

    const res = await downloadVideo(URL, { outputDir: dir, ytdlpBin: 'yt-dlp', pythonBin: '' });

    expect(res).toEqual({ ok: false, url: URL, error: 'yt-dlp not found. Please install it with: pip install yt-dlp' });
    expect(execaMock.mock.calls.map((c) => c[0])).toEqual(['yt-dlp', 'python3']);
  });

  it('does not retry through python when yt-dlp itself fails', async () => {
    execaMock.mockRejectedValue(
      Object.assign(new Error('Command failed with exit code 1'), { exitCode: 1, stderr: 'ERROR: Video unavailable' })
    );

    const res = await downloadVideo(URL, { outputDir: dir, ytdlpBin: 'yt-dlp', pythonBin: '' });

    expect(res).toEqual({
      ok: false,
      url: URL,
      error: 'yt-dlp failed: Command failed with exit code 1',
    });
    expect(execaMock).toHaveBeenCalledTimes(1);
  });

  it('cuts a segment from the resolved media URL', async () => {
    execaMock.mockImplementation(async (cmd) => ({
      stdout: cmd === 'yt-dlp' ? 'https://media.example.test/v.mp4\nhttps://media.example.test/a.m4a' : '',
      stderr: '',
    }));
    const outputPath = path.join(dir, 'clips', 'segment.mp4');

    const res = await downloadSegment(URL, {
      start: 30,
      duration: 10,
      outputPath,
      fps: 30,
      ytdlpBin: 'yt-dlp',
      pythonBin: '',
      ffmpegBin: 'ffmpeg',
    });

    expect(res).toEqual({ ok: true, url: URL, output: outputPath });
    expect(execaMock.mock.calls[0].slice(0, 2)).toEqual(['yt-dlp', ['-f', '18', '--get-url', URL]]);
    expect(execaMock.mock.calls[1].slice(0, 2)).toEqual([
      'ffmpeg',
      [
        '-y', '-loglevel', 'error', '-hide_banner', '-nostdin',
        '-ss', '30', '-i', 'https://media.example.test/v.mp4', '-t', '10',
        '-c:v', 'libx264', '-r', '30', '-fps_mode', 'passthrough', outputPath,
      ],
    ]);
  });

  it('fails when yt-dlp prints no URL', async () => {
    execaMock.mockResolvedValue({ stdout: '', stderr: '' });

    const res = await downloadSegment(URL, { start: 0, duration: 5, outputPath: path.join(dir, 's.mp4'), ytdlpBin: 'yt-dlp', pythonBin: '' });

    expect(res).toEqual({ ok: false, url: URL, error: `yt-dlp returned no media URL for ${URL}` });
  });
});
