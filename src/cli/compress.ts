import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { ENV } from "../pipeline/env";
import { compressDirectory } from "../pipeline/compress";

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option("input", { type: "string", default: "obfuscated", describe: "Directory of source .mp4 files" })
    .option("output", { type: "string", default: "compressed", describe: "Directory for compressed files" })
    .option("workers", { type: "number", default: ENV.compressWorkers })
    .option("crf", { type: "number", default: ENV.compressCrf })
    .parse();

  const { results, counts } = await compressDirectory({
    inputDir: argv.input,
    outputDir: argv.output,
    workers: argv.workers,
    crf: argv.crf,
  });

  console.log(`Found ${results.length} videos to compress`);
  for (const r of results) {
    if (r.status === "error") console.log(`Error: ${r.file}`);
  }
  console.log(`\n=== Compression Summary ===`);
  console.log(`GPU:      ${counts.gpu}`);
  console.log(`CPU:      ${counts.cpu}`);
  console.log(`Skipped:  ${counts.skipped}`);
  console.log(`Failed:   ${counts.error}`);
  console.log("Compression complete!");
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
