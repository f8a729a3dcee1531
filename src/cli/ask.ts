import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { ENV } from "../pipeline/env";
import { askAboutVideo } from "../pipeline/gemini";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .usage("$0 <video> <question>")
    .demandCommand(2, "Provide a video path and a question")
    .option("model", { type: "string", default: ENV.geminiModel })
    .parse();

  const [videoPath, question] = argv._.map(String);
  console.log("Uploading file...");
  const text = await askAboutVideo(videoPath, question, {
    model: argv.model,
    onPoll: () => process.stdout.write("."),
  });
  console.log(`Response: ${text}`);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
