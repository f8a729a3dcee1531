import { describe, it, expect, vi, beforeEach } from 'vitest';
import { runCommand, runFirstAvailable, toolCandidates } from '../src/pipeline/exec';
import { ToolError } from '../src/pipeline/errors';

const { execaMock } = vi.hoisted(() => ({
  execaMock: vi.fn<(cmd: string, args: string[]) => Promise<{ stdout: string; stderr: string }>>(),
}));
vi.mock('execa', () => ({ execa: execaMock }));

const enoent = () => Object.assign(new Error('spawn scenedetect ENOENT'), { code: 'ENOENT' });

describe('toolCandidates', () => {
  it('lists the binary, then the python module fallbacks', () => {
    expect(toolCandidates('/opt/bin/scenedetect', 'scenedetect', 'scenedetect', '.venv/bin/python', ['-i', 'v.mp4'])).toEqual([
      ['/opt/bin/scenedetect', ['-i', 'v.mp4']],
      ['scenedetect', ['-i', 'v.mp4']],
      ['.venv/bin/python', ['-m', 'scenedetect', '-i', 'v.mp4']],
      ['python3', ['-m', 'scenedetect', '-i', 'v.mp4']],
    ]);
  });

  it('does not repeat the same command', () => {
    expect(toolCandidates('yt-dlp', 'yt-dlp', 'yt_dlp', 'python3', ['URL'])).toEqual([
      ['yt-dlp', ['URL']],
      ['python3', ['-m', 'yt_dlp', 'URL']],
    ]);
  });
});

describe('runCommand', () => {
  beforeEach(() => {
    execaMock.mockReset();
  });

  it('returns the output of the process', async () => {
    execaMock.mockResolvedValue({ stdout: 'out', stderr: 'err' });
    await expect(runCommand('ffprobe', ['-v', 'error'])).resolves.toEqual({ stdout: 'out', stderr: 'err' });
    expect(execaMock).toHaveBeenCalledWith('ffprobe', ['-v', 'error'], { stdio: 'pipe' });
  });

  it('marks a missing executable', async () => {
    execaMock.mockRejectedValue(enoent());
    const err = await runCommand('scenedetect', []).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ToolError);
    expect(err).toMatchObject({ message: 'scenedetect not found', missing: true, code: 'tool_missing' });
  });

  it('keeps the exit code and stderr of a failed run', async () => {
    execaMock.mockRejectedValue(
      Object.assign(new Error('Command failed with exit code 1: ffmpeg'), { exitCode: 1, stderr: 'No such file' })
    );
    const err = await runCommand('ffmpeg', []).catch((e: unknown) => e);
    expect(err).toMatchObject({
      message: 'ffmpeg failed: Command failed with exit code 1: ffmpeg',
      exitCode: 1,
      stderr: 'No such file',
      missing: false,
    });
  });
});

describe('runFirstAvailable', () => {
  beforeEach(() => {
    execaMock.mockReset();
  });

  it('falls through to the next candidate', async () => {
    execaMock.mockRejectedValueOnce(enoent()).mockResolvedValueOnce({ stdout: 'ok', stderr: '' });
    const res = await runFirstAvailable(
      [
        ['scenedetect', ['--version']],
        ['python3', ['-m', 'scenedetect', '--version']],
      ],
      'scenedetect'
    );
    expect(res).toEqual({ stdout: 'ok', stderr: '', cmd: 'python3' });
  });

  it('lists every candidate when none is installed', async () => {
    execaMock.mockRejectedValue(enoent());
    const err = await runFirstAvailable([['a', []], ['b', []]], 'tool').catch((e: unknown) => e);
    expect(err).toMatchObject({
      message: 'No tool command found. Tried:\n[a] a not found\n[b] b not found',
      missing: true,
    });
  });

  it('stops at the first installed candidate that fails', async () => {
    execaMock.mockRejectedValueOnce(
      Object.assign(new Error('Command failed with exit code 1: scenedetect'), {
        exitCode: 1,
        stderr: 'Failed to read frame',
      })
    );
    const err = await runFirstAvailable(
      [
        ['scenedetect', ['-i', 'v.mp4']],
        ['python3', ['-m', 'scenedetect', '-i', 'v.mp4']],
      ],
      'scenedetect'
    ).catch((e: unknown) => e);

    expect(execaMock).toHaveBeenCalledTimes(1);
    expect(err).toBeInstanceOf(ToolError);
    expect(err).toMatchObject({
      message: 'scenedetect failed: Command failed with exit code 1: scenedetect',
      exitCode: 1,
      stderr: 'Failed to read frame',
      missing: false,
    });
  });
});
