/**
 * REPL command interpreter.
 *
 * Turns one line of input into operations on a {@link TreeMap} and a list of
 * colored messages for the terminal front end to print. Nothing here touches
 * the terminal, so the interpreter can be driven directly.
 *
 * @module
 */
import { type RandomSource, randKey } from "../data/map/generator.ts";
import type { TreeMap } from "../data/map/treeMap.ts";

export type Tone = "green" | "cyan" | "yellow" | "red";

export interface ReplMessage {
  tone: Tone;
  text: string;
}

export interface CommandResult {
  messages: ReplMessage[];
  quit: boolean;
}

export interface ReplSession {
  readonly map: TreeMap;
  readonly random: RandomSource;
}

/** Length of keys and values inserted by `:gen`. */
const GENERATED_LENGTH = 6;
const MAX_GENERATE = 100_000;

export const HELP_TEXT = `
Available commands:
  :i or :put <key> <value>  -- insert a key, or overwrite its value
  :g or :get <key>          -- look up a key
  :d or :del <key>          -- delete a key
  :has <key>                -- report whether a key is present
  :size                     -- number of stored keys
  :root                     -- key at the root of the splay tree
  :gen <n>                  -- insert n random keys
  :clear                    -- remove every key
  :help                     -- display this help message
  :quit                     -- exit the REPL

Any other input is looked up as a key.
Press CTRL+C or type :quit to exit.`;

const say = (tone: Tone, text: string): CommandResult => ({
  messages: [{ tone, text }],
  quit: false,
});

function lookup(session: ReplSession, key: string): CommandResult {
  const value = session.map.get(key);
  if (value === undefined) {
    return say("yellow", `${key} is not present`);
  }
  return say("green", `${key} = ${JSON.stringify(value)}`);
}

function generate(session: ReplSession, countArg: string): CommandResult {
  const count = Number(countArg);
  if (!Number.isInteger(count) || count <= 0 || count > MAX_GENERATE) {
    return say(
      "yellow",
      `usage: :gen <n> with n between 1 and ${MAX_GENERATE.toString()}`,
    );
  }

  const before = session.map.size;
  for (let i = 0; i < count; i++) {
    session.map.insert(
      randKey(session.random, GENERATED_LENGTH),
      randKey(session.random, GENERATED_LENGTH),
    );
  }
  const added = session.map.size - before;
  return say(
    "green",
    `generated ${count.toString()} pairs (${added.toString()} new keys, size ${session.map.size.toString()})`,
  );
}

export function processCommand(
  session: ReplSession,
  input: string,
): CommandResult {
  const line = input.trim();
  if (line === "") return { messages: [], quit: false };

  if (!line.startsWith(":")) {
    return lookup(session, line);
  }

  // Remove the colon prefix and split on whitespace.
  const parts = line.slice(1).trim().split(/\s+/);
  const cmd = parts[0].toLowerCase();
  const { map } = session;

  switch (cmd) {
    case "i":
    case "put": {
      // the value is the rest of the line, inner whitespace included
      const match = /^\S+\s+(\S+)\s+(.+)$/s.exec(line.slice(1).trim());
      if (match === null) return say("yellow", "usage: :put <key> <value>");
      const [, key, value] = match;
      const existed = map.has(key);
      map.insert(key, value);
      return say(
        "green",
        `${existed ? "updated" : "inserted"} ${key} = ${JSON.stringify(value)}`,
      );
    }
    case "g":
    case "get":
      if (parts.length < 2) return say("yellow", "usage: :get <key>");
      return lookup(session, parts[1]);
    case "d":
    case "del": {
      if (parts.length < 2) return say("yellow", "usage: :del <key>");
      const key = parts[1];
      if (!map.has(key)) return say("yellow", `${key} is not present`);
      map.deleteKey(key);
      return say("green", `deleted ${key}`);
    }
    case "has":
      if (parts.length < 2) return say("yellow", "usage: :has <key>");
      return say("cyan", `${parts[1]}: ${map.has(parts[1]) ? "yes" : "no"}`);
    case "size":
      return say("cyan", `size: ${map.size.toString()}`);
    case "root": {
      const root = map.rootKey();
      return root === undefined
        ? say("cyan", "the map is empty")
        : say("cyan", `root: ${root}`);
    }
    case "gen":
      if (parts.length < 2) return say("yellow", "usage: :gen <n>");
      return generate(session, parts[1]);
    case "clear":
      map.clear();
      return say("green", "cleared the map");
    case "help":
      return say("green", HELP_TEXT);
    case "quit":
      return { messages: [{ tone: "green", text: "exiting REPL." }], quit: true };
    default:
      return say("yellow", `unknown command: ${line}`);
  }
}
