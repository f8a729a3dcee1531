import { hideBin } from "yargs/helpers";
import { describeError } from "../pipeline/errors";
import { error } from "../pipeline/log";
import { runScenesCli } from "./scenes_command";

runScenesCli(hideBin(process.argv))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e) => {
    error("scenes.fatal", { error: describeError(e) });
    console.error(e);
    process.exit(1);
  });
