import { describe, expect, it } from "vitest";
import { CliUsageError, parseArgs } from "./args.js";

describe("parseArgs", () => {
  it("shows help without a command", () => {
    expect(parseArgs([])).toEqual({ kind: "help" });
    expect(parseArgs(["-h"])).toEqual({ kind: "help" });
  });

  it("recognizes --version", () => {
    expect(parseArgs(["--version"])).toEqual({ kind: "version" });
  });

  it("reads parse with and without a file", () => {
    expect(parseArgs(["parse"])).toEqual({ kind: "parse", file: undefined });
    expect(parseArgs(["parse", "req.txt"])).toEqual({
      kind: "parse",
      file: "req.txt",
    });
  });

  it("rejects a second file for parse", () => {
    expect(() => parseArgs(["parse", "a.txt", "b.txt"])).toThrow(
      "parse takes one file",
    );
  });

  it("fills serve defaults from the server config", () => {
    expect(parseArgs(["serve"])).toEqual({
      kind: "serve",
      port: 8080,
      host: "127.0.0.1",
      quiet: false,
      logLevel: "info",
      timeoutMs: 5000,
    });
  });

  it("applies serve flags", () => {
    expect(
      parseArgs([
        "serve",
        "-p",
        "9000",
        "--host",
        "0.0.0.0",
        "-q",
        "--log-level",
        "debug",
        "--timeout",
        "250",
      ]),
    ).toEqual({
      kind: "serve",
      port: 9000,
      host: "0.0.0.0",
      quiet: true,
      logLevel: "debug",
      timeoutMs: 250,
    });
  });

  it("rejects bad values and unknown input", () => {
    expect(() => parseArgs(["serve", "--port", "abc"])).toThrow(
      "Invalid value for --port: abc",
    );
    expect(() => parseArgs(["serve", "--log-level", "loud"])).toThrow(
      "Invalid log level: loud",
    );
    expect(() => parseArgs(["serve", "--cors"])).toThrow(CliUsageError);
    expect(() => parseArgs(["fetch"])).toThrow("Unknown command: fetch");
  });
});
