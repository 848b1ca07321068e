import { runCli } from "./cli";
import { logFatal } from "./logger";

runCli(process.argv).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    logFatal("Unexpected error", err);
    process.exitCode = 1;
  }
);
