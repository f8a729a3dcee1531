import { describe, it, expect } from 'vitest';
import { parseFrameRate, parseProbeOutput } from '../src/pipeline/probe';
import { ToolError } from '../src/pipeline/errors';

describe('parseFrameRate', () => {
  it('handles rational and plain rates', () => {
    expect(parseFrameRate('60/1')).toBe(60);
    expect(parseFrameRate('30000/1001')).toBeCloseTo(29.97, 2);
    expect(parseFrameRate('25')).toBe(25);
  });

  it('returns NaN for unknown rates', () => {
    expect(parseFrameRate('0/0')).toBeNaN();
    expect(parseFrameRate('')).toBeNaN();
    expect(parseFrameRate(undefined)).toBeNaN();
  });
});

describe('parseProbeOutput', () => {
  it('reads rate, packet count, size and duration', () => {
    const stdout = JSON.stringify({
      streams: [
        {
          width: 1920,
          height: 1080,
          r_frame_rate: '60/1',
          avg_frame_rate: '60/1',
          nb_frames: '598',
          nb_read_packets: '600',
        },
      ],
      format: { duration: '10.000000' },
    });

    expect(parseProbeOutput(stdout, 'a.mp4')).toEqual({
      fps: 60,
      totalFrames: 600,
      width: 1920,
      height: 1080,
      durationSec: 10,
    });
  });

  it('falls back to avg_frame_rate and duration when counts are absent', () => {
    const stdout = JSON.stringify({
      streams: [{ width: 640, height: 360, r_frame_rate: '0/0', avg_frame_rate: '30/1' }],
      format: { duration: '4.0' },
    });

    const probe = parseProbeOutput(stdout, 'b.mp4');
    expect(probe.fps).toBe(30);
    expect(probe.totalFrames).toBe(120);
  });

  it('fails on a file without a video stream', () => {
    expect(() => parseProbeOutput(JSON.stringify({ streams: [] }), 'audio.m4a')).toThrow(
      'No video stream found in audio.m4a'
    );
  });

  it('fails on non-JSON output', () => {
    expect(() => parseProbeOutput('Invalid data found', 'x.mp4')).toThrow(ToolError);
  });
});
