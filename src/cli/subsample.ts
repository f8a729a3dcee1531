import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { subsampleVideo } from "../pipeline/fps";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("input", { type: "string", demandOption: true })
    .option("output", { type: "string", demandOption: true })
    .option("fps", { type: "number", demandOption: true, describe: "Target sampling rate" })
    .parse();

  const res = await subsampleVideo(argv.input, argv.output, argv.fps);
  console.log(
    `Subsampled video saved to ${res.outputPath} at ${res.outputFps} fps (original fps: ${res.inputFps}, ${res.frames} frames)`
  );
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
