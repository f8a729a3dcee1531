import { afterEach } from 'vitest';

afterEach(async () => {
  // Loaded lazily so the setup file does not cache src modules before a test file's vi.mock runs.
  const { removeTempDirs } = await import('./helpers');
  await removeTempDirs();
});
