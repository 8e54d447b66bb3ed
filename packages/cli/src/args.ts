import {
  defaultConfig,
  isLogLevel,
  type LogLevel,
} from "@crlf/engine";

export type CliCommand =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "parse"; file?: string }
  | {
      kind: "serve";
      port: number;
      host: string;
      quiet: boolean;
      logLevel: LogLevel;
      timeoutMs: number;
    };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

function readInt(flag: string, value: string | undefined): number {
  const parsed = Number.parseInt(value ?? "", 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new CliUsageError(`Invalid value for ${flag}: ${value ?? "(missing)"}`);
  }
  return parsed;
}

export function parseArgs(args: string[]): CliCommand {
  const [command, ...rest] = args;

  if (command === undefined || command === "--help" || command === "-h") {
    return { kind: "help" };
  }
  if (command === "--version" || command === "-v") {
    return { kind: "version" };
  }

  if (command === "parse") {
    let file: string | undefined;
    for (const arg of rest) {
      if (arg === "--help" || arg === "-h") return { kind: "help" };
      if (arg.startsWith("-")) throw new CliUsageError(`Unknown option: ${arg}`);
      if (file !== undefined) throw new CliUsageError("parse takes one file");
      file = arg;
    }
    return { kind: "parse", file };
  }

  if (command === "serve") {
    const defaults = defaultConfig();
    let port = defaults.port;
    let host = defaults.host;
    let quiet = defaults.quiet;
    let logLevel = defaults.logLevel;
    let timeoutMs = defaults.requestTimeoutMs;

    let i = 0;
    while (i < rest.length) {
      const arg = rest[i];
      if (arg === "--port" || arg === "-p") {
        port = readInt(arg, rest[++i]);
      } else if (arg === "--host" || arg === "-H") {
        const value = rest[++i];
        if (!value) throw new CliUsageError(`Missing value for ${arg}`);
        host = value;
      } else if (arg === "--quiet" || arg === "-q") {
        quiet = true;
      } else if (arg === "--log-level") {
        const value = rest[++i] ?? "";
        if (!isLogLevel(value)) {
          throw new CliUsageError(`Invalid log level: ${value}`);
        }
        logLevel = value;
      } else if (arg === "--timeout") {
        timeoutMs = readInt(arg, rest[++i]);
      } else if (arg === "--help" || arg === "-h") {
        return { kind: "help" };
      } else {
        throw new CliUsageError(`Unknown option: ${arg}`);
      }
      i++;
    }

    return { kind: "serve", port, host, quiet, logLevel, timeoutMs };
  }

  throw new CliUsageError(`Unknown command: ${command}`);
}

export const HELP_TEXT = `
crlf - parse raw HTTP/1.x requests

Usage:
  crlf parse [file]        Print the parsed request read from file or stdin
  crlf serve [options]     Answer every request with its parsed form

Serve options:
  --port, -p <port>        Port to listen on (default: 8080)
  --host, -H <host>        Host to bind (default: 127.0.0.1)
  --quiet, -q              Suppress request logging
  --log-level <level>      debug, info, warn or error (default: info)
  --timeout <ms>           Time allowed to receive a request (default: 5000)

  --version, -v            Show version
  --help, -h               Show this help
`;
