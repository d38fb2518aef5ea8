#!/usr/bin/env node
import "dotenv/config";
import { readFile, writeFile } from "node:fs/promises";
import { text } from "node:stream/consumers";
import { runCli } from "./cli/run.js";

// Info lines go to stdout, which carries the output here.
process.env.DISTILL_LOG_LEVEL ??= "warn";

const exitCode = await runCli(process.argv.slice(2), {
  readFile: (path) => readFile(path, "utf-8"),
  readStdin: () => text(process.stdin),
  writeFile: (path, content) => writeFile(path, content, "utf-8"),
  stdout: (chunk) => process.stdout.write(chunk),
  stderr: (chunk) => process.stderr.write(chunk),
});
process.exitCode = exitCode;
