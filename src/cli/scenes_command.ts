import fs from "fs-extra";
import yargs from "yargs";
import { ENV } from "../pipeline/env";
import {
  SCENE_DEFAULTS,
  SceneRunConfig,
  assertNonNegativeInt,
  resolveScenePaths,
} from "../pipeline/config";
import { createPySceneDetectDetector } from "../pipeline/detect";
import { createFfmpegSplitter } from "../pipeline/split";
import { createFfmpegRenderer } from "../pipeline/annotate";
import { SceneRunDeps, runSceneDetection } from "../pipeline/run";
import { ConfigError } from "../pipeline/errors";
import { isLogLevel, setLogFile, setLogLevel } from "../pipeline/log";

async function scenes(args: string[], deps?: SceneRunDeps): Promise<number> {
  const argv = await yargs(args)
    .option("data-path", { type: "string", default: SCENE_DEFAULTS.dataPath, describe: "Manifest JSON (list of { video })" })
    .option("video-dir", { type: "string", default: SCENE_DEFAULTS.videoDir, describe: "Directory containing the videos" })
    .option("global-path", { type: "string", default: SCENE_DEFAULTS.globalPath, describe: "Base path for relative paths" })
    .option("output-path", { type: "string", default: SCENE_DEFAULTS.outputPath, describe: "Scene metadata JSON to write" })
    .option("threshold", { type: "number", default: ENV.sceneThreshold, describe: "Content detection threshold" })
    .option("debug", { type: "boolean", default: false, describe: "Process only the first N videos and save annotated clips" })
    .option("debug-limit", { type: "number", default: SCENE_DEFAULTS.debugLimit, describe: "Number of videos to process in debug mode" })
    .option("debug-output", { type: "string", default: ENV.debugScenesDir, describe: "Directory for debug clips" })
    .option("log-level", { type: "string", choices: ["debug", "info", "warn", "error"], describe: "Override LOG_LEVEL" })
    .option("log-file", { type: "string", describe: "Also append JSON log lines to this file" })
    .check((a) => {
      assertNonNegativeInt("--threshold", a.threshold);
      assertNonNegativeInt("--debug-limit", a["debug-limit"]);
      return true;
    })
    .fail((msg, err) => {
      throw err instanceof Error ? err : new ConfigError(msg);
    })
    .strict()
    .help()
    .parse();

  const level = argv["log-level"];
  if (isLogLevel(level)) setLogLevel(level);
  if (argv["log-file"]) setLogFile(argv["log-file"]);

  const paths = resolveScenePaths({
    globalPath: argv["global-path"],
    dataPath: argv["data-path"],
    videoDir: argv["video-dir"],
    outputPath: argv["output-path"],
  });

  if (!(await fs.pathExists(paths.manifestPath))) {
    console.error(`Error: Data file not found: ${paths.manifestPath}`);
    return 1;
  }
  if (!(await fs.pathExists(paths.videoDir))) {
    console.error(`Error: Video directory not found: ${paths.videoDir}`);
    return 1;
  }

  const config: SceneRunConfig = {
    ...paths,
    threshold: argv.threshold,
    debug: argv.debug,
    debugLimit: argv["debug-limit"],
    debugOutputDir: argv["debug-output"],
  };

  const summary = await runSceneDetection(
    config,
    deps ?? {
      detector: createPySceneDetectDetector(),
      splitter: createFfmpegSplitter(),
      renderer: createFfmpegRenderer(),
    }
  );

  console.log(`Loaded ${summary.manifestTotal} entries from dataset`);
  if (config.debug) {
    console.log(`Debug mode: Processed ${summary.processedCount} videos`);
    console.log(`Scene clips saved to: ${config.debugOutputDir}`);
  } else {
    console.log(
      `Processed ${summary.validCount} valid videos out of ${summary.manifestTotal} total`
    );
  }
  console.log(`Scene metadata saved to: ${summary.outputPath}`);
  return 0;
}

/**
 * Runs the scene command over already-split arguments and returns the exit code.
 * Bad flags and missing inputs give 1; anything else that throws is left to the caller.
 */
export async function runScenesCli(args: string[], deps?: SceneRunDeps): Promise<number> {
  try {
    return await scenes(args, deps);
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(`Error: ${e.message}`);
      return 1;
    }
    throw e;
  }
}
