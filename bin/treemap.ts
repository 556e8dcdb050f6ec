/**
 * Splay tree string map CLI (treemap)
 *
 * Runs the insert/get/delete demonstration, or an interactive REPL over a
 * single map.
 *
 * Usage:
 *   treemap                 # REPL
 *   treemap --demo          # demonstration
 *   treemap --seed abc      # REPL with a fixed seed for :gen
 *   treemap --help
 */
import { hrtime } from "node:process";
import rsexport from "random-seed";
import tkexport from "terminal-kit";

import {
  CliArgumentError,
  type CLIOptions,
  helpText,
  parseArgs,
} from "../lib/cli/args.ts";
import { runDemo } from "../lib/cli/demo.ts";
import { TreeMap } from "../lib/data/map/treeMap.ts";
import {
  processCommand,
  type ReplMessage,
  type ReplSession,
} from "../lib/repl/commands.ts";
import { VERSION } from "../lib/shared/version.ts";

const { create } = rsexport;
const { terminal } = tkexport;

function print({ tone, text }: ReplMessage): void {
  terminal("\n");
  switch (tone) {
    case "green":
      terminal.green(text + "\n");
      break;
    case "cyan":
      terminal.cyan(text + "\n");
      break;
    case "yellow":
      terminal.yellow(text + "\n");
      break;
    case "red":
      terminal.red(text + "\n");
      break;
  }
}

function repl(session: ReplSession, history: string[]): void {
  terminal(`\n[${session.map.size.toString()}] > `);

  terminal.inputField(
    {
      history,
      autoCompleteHint: false,
      autoCompleteMenu: false,
    },
    (error: unknown, input?: string) => {
      if (error) {
        print({ tone: "red", text: "error: " + String(error) });
        process.exit(1);
      }

      const trimmedInput = (input ?? "").trim();
      if (trimmedInput) {
        history.push(trimmedInput);
      }

      const result = processCommand(session, trimmedInput);
      result.messages.forEach(print);
      if (result.quit) {
        process.exit(0);
      }
      repl(session, history);
    },
  );
}

function readOptions(args: string[]): CLIOptions {
  try {
    return parseArgs(args);
  } catch (e) {
    if (e instanceof CliArgumentError) {
      console.error(e.message);
      console.error("Use --help for usage information.");
      process.exit(1);
    }
    throw e;
  }
}

function main(args: string[]): void {
  const options = readOptions(args);

  if (options.help) {
    console.log(helpText(VERSION));
    return;
  }
  if (options.version) {
    console.log(`treemap v${VERSION}`);
    return;
  }
  if (options.demo) {
    runDemo().forEach((line) => {
      console.log(line);
    });
    return;
  }

  const seed = options.seed ?? hrtime.bigint().toString();
  const session: ReplSession = { map: new TreeMap(), random: create(seed) };

  terminal.on("key", (name: string) => {
    if (name === "CTRL_C") {
      print({ tone: "green", text: "exiting REPL." });
      process.exit(0);
    }
  });

  print({ tone: "cyan", text: `treemap v${VERSION} (seed ${seed}), :help for commands` });
  repl(session, []);
}

main(process.argv.slice(2));
