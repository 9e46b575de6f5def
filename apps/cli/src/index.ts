import "dotenv/config";
import { readFile } from "node:fs/promises";
import pino from "pino";
import { run } from "./run.js";

const logger = pino(
  { name: "payoff-criteria", level: process.env.LOG_LEVEL || "info" },
  pino.destination(2),
);

run(process.argv.slice(2), {
  write: (line) => process.stdout.write(`${line}\n`),
  readFile: (path) => readFile(path, "utf-8"),
  env: process.env,
  logger,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    logger.fatal({ err }, "unexpected failure");
    process.exitCode = 1;
  });
