#!/usr/bin/env node
// src/ui/index.ts
//
// Command-line entry point.
//
//   find              search seeds until one ends with a single peg
//   simulate <seed>   animated run (seed 0 = random)
//   serve [port]      WebSocket presenter
//   watch <seed> [url]

import path from "node:path";

import { loadConfig, UsageError } from "../config";
import { startServer } from "../server/start";
import { parseArgs, runFind, runSimulate } from "./cli";
import { ConsolePresenter } from "./presenter";
import { DEFAULT_WS_URL, watchRemote } from "./wsWatchClient";

export async function main(argv: readonly string[]): Promise<number> {
  const program = path.basename(argv[1] ?? "peg-solitaire");

  try {
    const command = parseArgs(argv.slice(2), program);
    const config = loadConfig();

    switch (command.kind) {
      case "find":
        runFind(config, { out: (line) => console.log(line) });
        return 0;

      case "simulate":
        await runSimulate(command.seed, config, new ConsolePresenter({ clearScreen: config.clearScreen }));
        return 0;

      case "serve":
        await startServer(config, command.port);
        // Keeps running until the process is stopped.
        return 0;

      case "watch":
        await watchRemote(
          command.url ?? process.env.PEG_WS_URL ?? DEFAULT_WS_URL,
          command.seed,
          new ConsolePresenter({ clearScreen: config.clearScreen })
        );
        return 0;
    }
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(err.message);
      return 1;
    }
    throw err;
  }
}

if (require.main === module) {
  main(process.argv)
    .then((code) => {
      if (code !== 0) process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error(err);
      process.exit(1);
    });
}
