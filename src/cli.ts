#!/usr/bin/env node
/**
 * searxng-pager CLI
 */

import { runCli } from "./cli/run";

runCli(process.argv.slice(2), {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
}).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("Unexpected failure:", error);
    process.exitCode = 1;
  },
);
