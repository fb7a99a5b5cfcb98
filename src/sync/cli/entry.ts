import "dotenv/config";
import { USAGE, UsageError, parseCliArgs } from "./args";
import { runCommand } from "./commands";
import { exitCodeForError } from "./format";
import { errorMessage } from "@/sync/types";

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return 0;
  }
  return runCommand(args);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    if (err instanceof UsageError) {
      console.error(`${err.message}\n\n${USAGE}`);
    } else {
      console.error("Sync failed:", errorMessage(err));
    }
    process.exitCode = exitCodeForError(err);
  });
