import fs from "fs-extra";
import path from "path";
import { info } from "./log";
import { AggregateMetadata } from "./types";

/** Writes the aggregate as pretty-printed JSON, replacing any existing file. */
export async function writeMetadata(
  outputPath: string,
  aggregate: AggregateMetadata
): Promise<string> {
  await fs.ensureDir(path.dirname(outputPath));
  await fs.writeJson(outputPath, aggregate, { spaces: 2 });
  info("export.metadata", {
    outputPath,
    videos: Object.keys(aggregate.videos).length,
  });
  return outputPath;
}
