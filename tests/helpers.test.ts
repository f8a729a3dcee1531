import { describe, it, expect } from 'vitest';
import fs from 'fs-extra';
import path from 'path';
import { makeTempDir, removeTempDirs } from './helpers';

describe('temp dirs', () => {
  it('removes every directory made by makeTempDir, contents included', async () => {
    const a = await makeTempDir();
    const b = await makeTempDir();
    await fs.outputFile(path.join(b, 'nested', 'clip.mp4'), 'raw');

    await removeTempDirs();

    expect(await fs.pathExists(a)).toBe(false);
    expect(await fs.pathExists(b)).toBe(false);
  });
});
