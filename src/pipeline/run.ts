import fs from "fs-extra";
import { SceneRunConfig, validateSceneRunConfig } from "./config";
import { loadDataset } from "./dataset";
import { detectScenes } from "./detect";
import { DebugClipDeps, generateDebugClips } from "./annotate";
import { writeMetadata } from "./export";
import { describeError } from "./errors";
import { info, warn, startStep } from "./log";
import { AggregateMetadata, SceneDetector, VideoEntry } from "./types";

export interface SceneRunDeps extends DebugClipDeps {
  detector: SceneDetector;
}

export interface RunSummary {
  aggregate: AggregateMetadata;
  outputPath: string;
  manifestTotal: number;
  /** Found entries reached by the loop, including ones that failed detection */
  validCount: number;
  /** Videos with a successful detection */
  processedCount: number;
}

export async function runSceneDetection(
  config: SceneRunConfig,
  deps: SceneRunDeps
): Promise<RunSummary> {
  validateSceneRunConfig(config);
  const dataset = await loadDataset(config.manifestPath, config.videoDir);
  if (config.debug) {
    await fs.ensureDir(config.debugOutputDir);
    info("run.debug", {
      limit: config.debugLimit,
      debugOutputDir: config.debugOutputDir,
    });
  }

  const videos: Record<string, VideoEntry> = {};
  let validCount = 0;
  let processedCount = 0;
  const timer = startStep("run.videos", {
    total: dataset.total,
    found: dataset.found,
    threshold: config.threshold,
  });

  for (const entry of dataset.entries) {
    if (entry.status === "missing") continue;
    validCount += 1;
    if (config.debug && processedCount >= config.debugLimit) break;

    const outcome = await detectScenes(entry.path, config.threshold, deps.detector);
    if (!outcome.ok) {
      videos[entry.filename] = { error: outcome.error, video_path: entry.path };
      timer.eta(validCount, dataset.found);
      continue;
    }

    if (config.debug) {
      try {
        await generateDebugClips(
          entry.path,
          outcome.metadata.scenes,
          outcome.metadata.fps,
          config.debugOutputDir,
          deps
        );
      } catch (e) {
        const error = describeError(e);
        warn("run.video.debugClips.fail", { video: entry.filename, error });
        videos[entry.filename] = { error, video_path: entry.path };
        timer.eta(validCount, dataset.found);
        continue;
      }
    }

    videos[entry.filename] = outcome.metadata;
    processedCount += 1;
    info("run.video.done", {
      video: entry.filename,
      scenes: outcome.metadata.num_scenes,
      processed: processedCount,
      ...(config.debug ? { limit: config.debugLimit } : {}),
    });
    timer.eta(validCount, dataset.found);
  }
  timer.end({ validCount, processedCount });

  const aggregate: AggregateMetadata = {
    threshold: config.threshold,
    total_videos: config.debug ? processedCount : validCount,
    debug_mode: config.debug,
    videos,
  };
  const outputPath = await writeMetadata(config.outputPath, aggregate);
  info("run.complete", {
    manifestTotal: dataset.total,
    validCount,
    processedCount,
    outputPath,
  });
  return {
    aggregate,
    outputPath,
    manifestTotal: dataset.total,
    validCount,
    processedCount,
  };
}
