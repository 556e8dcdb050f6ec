/**
 * Command-line option parsing for the treemap CLI.
 *
 * @module
 */
export class CliArgumentError extends Error {}

export interface CLIOptions {
  help: boolean;
  version: boolean;
  demo: boolean;
  seed?: string;
}

export function parseArgs(args: readonly string[]): CLIOptions {
  const options: CLIOptions = {
    help: false,
    version: false,
    demo: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case "--help":
      case "-h":
        options.help = true;
        break;
      case "--version":
      case "-v":
        options.version = true;
        break;
      case "--demo":
      case "-d":
        options.demo = true;
        break;
      case "--seed":
      case "-s": {
        const seed = args[i + 1];
        if (seed === undefined || seed.startsWith("-")) {
          throw new CliArgumentError(`${arg} requires a value`);
        }
        options.seed = seed;
        i++;
        break;
      }
      default:
        if (arg.startsWith("-")) {
          throw new CliArgumentError(`Unknown option: ${arg}`);
        }
        throw new CliArgumentError(`Unexpected argument: ${arg}`);
    }
  }

  return options;
}

export function helpText(version: string): string {
  return `
Splay tree string map (treemap) v${version}

USAGE:
    treemap              # Interactive REPL
    treemap --demo       # Run the insert/get/delete demonstration
    treemap [OPTIONS]

OPTIONS:
    -h, --help           Show this help message
    -v, --version        Show version information
    -d, --demo           Run the demonstration and exit
    -s, --seed <seed>    Seed for keys generated with :gen in the REPL
`;
}
