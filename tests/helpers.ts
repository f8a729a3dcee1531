import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { clipFileName } from '../src/pipeline/split';
import type {
  ClipRenderer,
  ClipSplitter,
  DetectionResult,
  SceneBoundary,
  SceneDetector,
} from '../src/pipeline/types';

const tempDirs: string[] = [];

export async function makeTempDir(prefix = 'video-tools-'): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

export async function removeTempDirs(): Promise<void> {
  const dirs = tempDirs.splice(0);
  await Promise.all(dirs.map((d) => fs.remove(d)));
}

/** Evenly sized cuts over `totalFrames` at `fps`. */
export function evenBoundaries(count: number, totalFrames: number, fps: number): SceneBoundary[] {
  const size = totalFrames / count;
  return Array.from({ length: count }, (_, i) => {
    const startFrame = Math.round(i * size);
    const endFrame = Math.round((i + 1) * size);
    return { startFrame, endFrame, startTime: startFrame / fps, endTime: endFrame / fps };
  });
}

export function detection(count: number, totalFrames = 300, fps = 30): DetectionResult {
  return { fps, totalFrames, scenes: evenBoundaries(count, totalFrames, fps) };
}

/** Detector answering from a table keyed by file name; an Error entry is thrown. */
export function fakeDetector(table: Record<string, DetectionResult | Error>): SceneDetector & {
  calls: string[];
} {
  const calls: string[] = [];
  return {
    calls,
    async detect(videoPath: string): Promise<DetectionResult> {
      const name = path.basename(videoPath);
      calls.push(name);
      const res = table[name];
      if (!res) throw new Error(`no canned detection for ${name}`);
      if (res instanceof Error) throw res;
      return res;
    },
  };
}

/** Writes one placeholder clip per scene, except the 1-based numbers in `skip`. */
export function fakeSplitter(skip: number[] = []): ClipSplitter & { calls: string[][] } {
  const calls: string[][] = [];
  return {
    calls,
    async split(videoPath, scenes, outDir, stem) {
      calls.push([videoPath, outDir, stem]);
      const out: string[] = [];
      for (let n = 1; n <= scenes.length; n++) {
        if (skip.includes(n)) continue;
        const clip = path.join(outDir, clipFileName(stem, n));
        await fs.writeFile(clip, 'raw');
        out.push(clip);
      }
      return out;
    },
  };
}

/** Writes `annotated:<text>` to the output path. */
export function fakeRenderer(): ClipRenderer & { calls: Array<[string, string, string, number]> } {
  const calls: Array<[string, string, string, number]> = [];
  return {
    calls,
    async render(inputPath, outputPath, text, fps) {
      calls.push([inputPath, outputPath, text, fps]);
      await fs.writeFile(outputPath, `annotated:${text}`);
    },
  };
}
