#!/usr/bin/env node
import "dotenv/config";
import { errorMessage } from "@goapbot/schemas";
import { createProgram } from "./program.js";

process.on("unhandledRejection", (reason) => {
  console.error("[goapbot] Unhandled rejection:", reason);
  process.exit(1);
});
process.on("uncaughtException", (err) => {
  console.error("[goapbot] Uncaught exception:", err);
  process.exit(1);
});

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = 1;
  });
