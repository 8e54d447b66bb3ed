import * as fs from "node:fs/promises";
import { text } from "node:stream/consumers";
import {
  basicLogger,
  createNodeServer,
  defaultConfig,
  filteredLogger,
  parseHttpRequest,
  prefixedLogger,
  VERSION,
} from "@crlf/engine";
import { type CliCommand, CliUsageError, HELP_TEXT, parseArgs } from "./args.js";
import { echoHandler, requestToJson } from "./echo.js";

async function runParse(file: string | undefined): Promise<void> {
  const raw = file ? await fs.readFile(file, "utf8") : await text(process.stdin);
  const request = parseHttpRequest(raw);
  console.log(JSON.stringify(requestToJson(request), null, 2));
}

async function runServe(
  command: Extract<CliCommand, { kind: "serve" }>,
): Promise<void> {
  const logger = filteredLogger(
    command.logLevel,
    prefixedLogger("crlf", basicLogger()),
  );

  const config = {
    ...defaultConfig(),
    port: command.port,
    host: command.host,
    quiet: command.quiet,
    logLevel: command.logLevel,
    requestTimeoutMs: command.timeoutMs,
  };

  const server = createNodeServer({ config, handler: echoHandler, logger });
  const port = await server.start();

  console.log(`\n  crlf echo server\n`);
  console.log(`  Local:   http://${config.host}:${port}`);
  console.log();

  const shutdown = () => {
    console.log("\nShutting down...");
    server
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error("Shutdown failed:", err);
        process.exit(1);
      });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

async function main(): Promise<void> {
  let command: CliCommand;
  try {
    command = parseArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(err.message);
      console.log(HELP_TEXT);
      process.exit(1);
    }
    throw err;
  }

  switch (command.kind) {
    case "help":
      console.log(HELP_TEXT);
      return;
    case "version":
      console.log(VERSION);
      return;
    case "parse":
      await runParse(command.file);
      return;
    case "serve":
      await runServe(command);
      return;
  }
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
