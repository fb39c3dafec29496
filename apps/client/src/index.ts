#!/usr/bin/env node
/**
 * voice-frames CLI entry point
 */

import { RealtimeCLI } from "./cli.js";

const input = process.argv[2];
const output = process.argv[3];

if (!input) {
  console.error("Usage: voice-frames <input.pcm> [output.pcm]");
  process.exit(1);
}

const cli = new RealtimeCLI();

cli.start(input, output).catch((err: Error) => {
  console.error("Dialog failed:", err.message);
  process.exit(1);
});
