#!/usr/bin/env node
/**
 * wvm binary entrypoint
 */
import { main } from "./cli.js";

main().then((code) => {
  process.exitCode = code;
}).catch((err: unknown) => {
  console.error("Fatal error:", err);
  process.exitCode = 1;
});
