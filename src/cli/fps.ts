import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { changeFps } from "../pipeline/fps";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("input", { type: "string", demandOption: true })
    .option("output", { type: "string", demandOption: true })
    .option("fps", { type: "number", demandOption: true, describe: "Playback rate for every source frame" })
    .parse();

  const res = await changeFps(argv.input, argv.output, argv.fps);
  console.log(`Saved video with ${res.outputFps} fps to ${res.outputPath}`);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
