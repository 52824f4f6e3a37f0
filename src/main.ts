import { version } from "../package.json";
import { defaultDependencies, runAdd } from "./commands/add";
import { EXIT_INTERRUPTED, EXIT_USER_ERROR } from "./utils/exit-codes";
import { killActiveCommands } from "./utils/process";

const HELP = `
bwssh - add SSH keys to ssh-agent with passphrases from Bitwarden

USAGE
  bwssh [flags]                 Unlock the vault and add every mapped key

FLAGS
  --config <path>               Config file (default: ./.bwssh/config.json, ~/.bwssh/config.json)
  --no-interaction              Never prompt; requires BW_SESSION
  --debug                       Show the commands being run
  --json                        Output as JSON
  -q, --quiet                   Suppress output, use exit codes
  -h, --help                    Show this help
  -v, --version                 Show version

CONFIG (~/.bwssh/config.json)
  {
    "vaultFolderId": "<bitwarden folder id>",
    "mappingFilePath": "keys.csv",
    "email": "you@example.com"
  }

MAPPING (one key per line, no header)
  <bitwarden item id>,~/.ssh/id_ed25519

ENVIRONMENT
  BWSSH_CONFIG                  Config file path
  BWSSH_NO_INTERACTION=1        Same as --no-interaction
  BW_SESSION                    Existing Bitwarden session to reuse
`;

const KNOWN_FLAGS = new Set([
  "--json",
  "--quiet",
  "-q",
  "--debug",
  "--no-interaction",
  "--config",
  "--help",
  "-h",
  "--version",
  "-v",
]);

async function main() {
  const args = process.argv.slice(2);

  const json = args.includes("--json");
  const quiet = args.includes("--quiet") || args.includes("-q");
  const debug = args.includes("--debug");

  if (args.includes("--help") || args.includes("-h")) {
    if (!quiet) console.log(HELP);
    process.exit(0);
  }

  if (args.includes("--version") || args.includes("-v")) {
    if (json) {
      console.log(JSON.stringify({ version }));
    } else if (!quiet) {
      console.log(`bwssh ${version}`);
    }
    process.exit(0);
  }

  const configIndex = args.indexOf("--config");
  const configPath = configIndex !== -1 ? args[configIndex + 1] : undefined;
  if (configIndex !== -1 && (!configPath || configPath.startsWith("-"))) {
    usageError("--config requires a path", json, quiet);
  }

  const unknown = args.filter(
    (a, i) => !KNOWN_FLAGS.has(a) && !(configIndex !== -1 && i === configIndex + 1)
  );
  if (unknown.length > 0) {
    usageError(`Unknown argument: ${unknown[0]}`, json, quiet);
  }

  const interactive =
    !args.includes("--no-interaction") && process.env.BWSSH_NO_INTERACTION !== "1";
  const options = { json, quiet, debug, interactive, configPath };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      killActiveCommands(signal);
      if (!quiet && !json) console.error(`\nInterrupted`);
      process.exit(EXIT_INTERRUPTED);
    });
  }

  const exitCode = await runAdd(defaultDependencies(options), options);
  process.exit(exitCode);
}

function usageError(message: string, json: boolean, quiet: boolean): never {
  if (json) {
    console.log(JSON.stringify({ success: false, error: "usage", message }));
  } else if (!quiet) {
    console.error(`Error: ${message}`);
    console.log(HELP);
  }
  process.exit(EXIT_USER_ERROR);
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
