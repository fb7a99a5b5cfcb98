export type Command = "init" | "sync" | "status" | "reset";

export interface CliArgs {
  command: Command;
  help: boolean;
  // init
  force: boolean;
  importPath?: string;
  // sync
  dryRun: boolean;
  quiet: boolean;
  maxRetries: number;
}

export const DEFAULT_MAX_RETRIES = 0;

export const USAGE = `Usage: goodlinks2insta [command] [options]

Sync GoodLinks to Instapaper.

Commands:
  init     initialize config with credentials
           -f, --force           overwrite existing config
           --import <file>       mark the ids in an old synced.json as synced
  sync     sync links to Instapaper (default)
           -n, --dry-run         show what would be synced
           -q, --quiet           suppress console output (for background runs)
           -r, --max-retries N   retries for failed requests (default: ${DEFAULT_MAX_RETRIES})
  status   show sync status
  reset    reset sync state

  -h, --help  show this help`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const COMMANDS: readonly Command[] = ["init", "sync", "status", "reset"];

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    command: "sync",
    help: false,
    force: false,
    dryRun: false,
    quiet: false,
    maxRetries: DEFAULT_MAX_RETRIES,
  };

  let rest = argv;
  const first = argv[0];
  if (first !== undefined && !first.startsWith("-")) {
    if (!isCommand(first)) {
      throw new UsageError(`Unknown command: ${first}`);
    }
    args.command = first;
    rest = argv.slice(1);
  }

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    const forCommand = (...allowed: Command[]) => {
      if (!allowed.includes(args.command)) {
        throw new UsageError(`Option ${arg} is not valid for '${args.command}'`);
      }
    };

    switch (arg) {
      case "-h":
      case "--help":
        args.help = true;
        break;
      case "-f":
      case "--force":
        forCommand("init");
        args.force = true;
        break;
      case "--import": {
        forCommand("init");
        const value = rest[++i];
        if (!value) throw new UsageError("--import needs a file path");
        args.importPath = value;
        break;
      }
      case "-n":
      case "--dry-run":
        forCommand("sync");
        args.dryRun = true;
        break;
      case "-q":
      case "--quiet":
        forCommand("sync");
        args.quiet = true;
        break;
      case "-r":
      case "--max-retries": {
        forCommand("sync");
        const value = Number(rest[++i]);
        if (!Number.isInteger(value) || value < 0) {
          throw new UsageError(`${arg} needs a whole number of retries`);
        }
        args.maxRetries = value;
        break;
      }
      default:
        throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  return args;
}
