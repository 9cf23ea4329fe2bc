import { runCli } from "./cli.js";

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error("[updater-error]", error);
    process.exitCode = 1;
  });
