#!/usr/bin/env node

import { runCli } from "./cli.js";

try {
  process.exitCode = runCli(process.argv, {
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
  });
} catch (err) {
  console.error("Fatal:", err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
}
