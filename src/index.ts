#!/usr/bin/env node
import { run } from "./cli.js";
import { loadConfig } from "./config.js";
import { describeError } from "./errors.js";
import { createConsoleIO } from "./report/io.js";

const io = createConsoleIO();

try {
  process.exitCode = await run(process.argv.slice(2), { config: loadConfig(), io });
} catch (err) {
  console.error(`[roadmap] ${describeError(err)}`);
  process.exitCode = 1;
} finally {
  io.close();
}
