#!/usr/bin/env node
import { createProgram } from "./cli/program.js";
import { startStdioServer } from "./mcp/server.js";
import { TwitterClient } from "./twitter.js";

const program = createProgram({
  createClient: () =>
    TwitterClient.fromEnvironment({}, {
      onRetry: (event) => console.error(`⚠ ${event.message}`),
    }),
  write: (text) => {
    process.stdout.write(text);
  },
  serve: startStdioServer,
});

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
