import path from "path";
import { ConfigError } from "./errors";

/** Everything the scene run needs; built once by the CLI and passed in. */
export interface SceneRunConfig {
  manifestPath: string;
  videoDir: string;
  outputPath: string;
  threshold: number;
  debug: boolean;
  debugLimit: number;
  debugOutputDir: string;
}

export const SCENE_DEFAULTS = {
  dataPath: "shot_test_video.json",
  videoDir: "compressed/",
  globalPath: ".",
  outputPath: "scene_metadata.json",
  debugLimit: 5,
} as const;

export interface ScenePathArgs {
  globalPath: string;
  dataPath: string;
  videoDir: string;
  outputPath: string;
}

function underBase(base: string, p: string): string {
  return path.isAbsolute(p) ? p : path.join(base, p);
}

/** Relative paths are joined under the global path; absolute ones are kept. */
export function resolveScenePaths(args: ScenePathArgs): {
  manifestPath: string;
  videoDir: string;
  outputPath: string;
} {
  return {
    manifestPath: underBase(args.globalPath, args.dataPath),
    videoDir: underBase(args.globalPath, args.videoDir),
    outputPath: underBase(args.globalPath, args.outputPath),
  };
}

export function assertNonNegativeInt(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got ${value}`, { [name]: value });
  }
}

/** Threshold and debug limit are whole numbers; NaN would disable the debug limit. */
export function validateSceneRunConfig(config: SceneRunConfig): void {
  assertNonNegativeInt("threshold", config.threshold);
  assertNonNegativeInt("debugLimit", config.debugLimit);
}
