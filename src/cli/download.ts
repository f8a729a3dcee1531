import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { downloadSegment, downloadVideo } from "../pipeline/ytdlp";

async function main(): Promise<number> {
  const argv = await yargs(hideBin(process.argv))
    .usage("$0 <url> [outputDir]")
    .demandCommand(1, "Provide a video URL")
    .option("quality", { type: "string", default: "best", describe: "yt-dlp format selector" })
    .option("segment-start", { type: "number", describe: "Download only a segment starting here (seconds)" })
    .option("segment-duration", { type: "number", describe: "Segment length (seconds)" })
    .option("fps", { type: "number", default: 25, describe: "Frame rate of a downloaded segment" })
    .option("out", { type: "string", describe: "Output file for a segment" })
    .parse();

  const [url, outputDir] = argv._.map(String);
  const start = argv["segment-start"];
  const duration = argv["segment-duration"];

  const res =
    start !== undefined && duration !== undefined
      ? await downloadSegment(url, {
          start,
          duration,
          fps: argv.fps,
          outputPath: argv.out ?? `${outputDir ?? "downloads"}/segment_${start}_${duration}.mp4`,
        })
      : await downloadVideo(url, { outputDir: outputDir ?? "downloads", quality: argv.quality });

  if (!res.ok) {
    console.error(`Error downloading ${url}: ${res.error}`);
    return 1;
  }
  console.log(`Successfully downloaded: ${url}`);
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e) => {
    console.error(e);
    process.exit(1);
  });
