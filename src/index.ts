#!/usr/bin/env node
import { runCli } from "./cli.js";

runCli()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("Fatal error:", err);
    process.exitCode = 1;
  });
