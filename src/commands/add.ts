import chalk from "chalk";
import { SshAgent } from "../agent/ssh-agent";
import { getGlobalConfigPath, loadConfig } from "../config/config";
import {
  ConfigurationError,
  MappingFileError,
  isEntryError,
  type EntryError,
} from "../errors";
import { readMapping } from "../mapping/mapping";
import type {
  Configuration,
  KeyRegistrar,
  MappingEntry,
  MappingResult,
  RegistrationResult,
  RegistrationStatus,
  SecretSource,
} from "../types";
import {
  EXIT_CONFIG_ERROR,
  EXIT_ERROR,
  EXIT_MAPPING_ERROR,
  EXIT_SUCCESS,
} from "../utils/exit-codes";
import { maskSecrets } from "../utils/mask";
import {
  debug,
  error,
  hint,
  info,
  isHuman,
  jsonOutput,
  output,
  success,
  warn,
  type OutputOptions,
} from "../utils/output";
import { BitwardenClient } from "../vault/bitwarden";

export interface AddOptions extends OutputOptions {
  configPath?: string;
  /** Let bw prompt for the master password */
  interactive?: boolean;
}

export interface AddDependencies {
  loadConfig: (path?: string) => Configuration;
  readMapping: (path: string) => MappingResult;
  createSource: (config: Configuration) => SecretSource;
  createRegistrar: (config: Configuration) => KeyRegistrar;
}

export interface RunSummary {
  results: RegistrationResult[];
  succeeded: number;
  failed: number;
}

export function defaultDependencies(options: AddOptions = {}): AddDependencies {
  return {
    loadConfig,
    readMapping,
    createSource: (config) =>
      new BitwardenClient({
        folderId: config.vaultFolderId,
        email: config.email,
        sync: config.sync,
        lockOnExit: config.lockOnExit,
        command: config.bwCommand,
        interactive: options.interactive,
        json: options.json,
        quiet: options.quiet,
        debug: options.debug,
      }),
    createRegistrar: (config) =>
      new SshAgent({
        command: config.sshAddCommand,
        json: options.json,
        quiet: options.quiet,
        debug: options.debug,
      }),
  };
}

function statusOf(err: EntryError): RegistrationStatus {
  switch (err.code) {
    case "key_file_not_found":
      return "key_file_not_found";
    case "agent_registration_failed":
      return "agent_registration_failed";
    default:
      return "vault_lookup_failed";
  }
}

async function processEntry(
  entry: MappingEntry,
  source: SecretSource,
  registrar: KeyRegistrar
): Promise<RegistrationResult> {
  let secret: string | null = null;

  try {
    secret = await source.fetchSecret(entry.vaultItemId);
    await registrar.registerKey(entry.keyPath, secret);
    return { entry, status: "succeeded" };
  } catch (err) {
    if (!isEntryError(err)) throw err;
    return {
      entry,
      status: statusOf(err),
      message: maskSecrets(err.message, secret === null ? [] : [secret]),
    };
  }
}

function reportEntry(result: RegistrationResult, options: OutputOptions): void {
  if (!isHuman(options)) return;

  const label = `${result.entry.keyPath} ${chalk.dim(`(${result.entry.vaultItemId})`)}`;
  if (result.status === "succeeded") {
    success(label);
  } else {
    error(`${label}: ${result.message ?? result.status}`);
  }
}

/**
 * Look up and register each entry in order. A failed entry never stops the
 * ones after it; the source is closed once the loop ends.
 */
export async function addKeys(
  entries: readonly MappingEntry[],
  source: SecretSource,
  registrar: KeyRegistrar,
  options: OutputOptions = {}
): Promise<RunSummary> {
  const results: RegistrationResult[] = [];

  try {
    for (const entry of entries) {
      debug(options, `Processing line ${entry.line}: item ${entry.vaultItemId}`);
      const result = await processEntry(entry, source, registrar);
      results.push(result);
      reportEntry(result, options);
    }
  } finally {
    await source.close();
  }

  const succeeded = results.filter((r) => r.status === "succeeded").length;
  return { results, succeeded, failed: results.length - succeeded };
}

function reportFatal(err: ConfigurationError | MappingFileError, options: OutputOptions): void {
  if (options.json) {
    jsonOutput({ success: false, error: err.code, message: err.message });
    return;
  }
  if (options.quiet) return;

  error(err.message);
  if (err instanceof ConfigurationError) {
    hint(`Create ${getGlobalConfigPath()} with "vaultFolderId" and "mappingFilePath"`);
  }
}

/**
 * Entry point for a run: config, mapping, then every mapped key.
 * Resolves to the process exit code.
 */
export async function runAdd(
  deps: AddDependencies,
  options: AddOptions = {}
): Promise<number> {
  let config: Configuration;
  let mapping: MappingResult;

  try {
    config = deps.loadConfig(options.configPath);
    debug(options, `Mapping file: ${config.mappingFilePath}`);
    mapping = deps.readMapping(config.mappingFilePath);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      reportFatal(err, options);
      return EXIT_CONFIG_ERROR;
    }
    if (err instanceof MappingFileError) {
      reportFatal(err, options);
      return EXIT_MAPPING_ERROR;
    }
    throw err;
  }

  if (isHuman(options)) {
    for (const warning of mapping.warnings) {
      warn(`Skipped mapping ${warning}`);
    }
  }

  if (mapping.entries.length === 0) {
    output(options, {
      json: () => ({ success: true, added: 0, failed: 0, results: [], warnings: mapping.warnings }),
      quiet: () => {},
      human: () => console.log(chalk.dim("No keys to add")),
    });
    return EXIT_SUCCESS;
  }

  if (isHuman(options)) {
    info(`Adding ${mapping.entries.length} key(s) to ssh-agent`);
  }

  const source = deps.createSource(config);
  const registrar = deps.createRegistrar(config);
  const summary = await addKeys(mapping.entries, source, registrar, options);

  output(options, {
    json: () => ({
      success: summary.failed === 0,
      added: summary.succeeded,
      failed: summary.failed,
      results: summary.results.map((r) => ({
        itemId: r.entry.vaultItemId,
        keyPath: r.entry.keyPath,
        status: r.status,
        ...(r.message ? { error: r.message } : {}),
      })),
      warnings: mapping.warnings,
    }),
    quiet: () => {},
    human: () => {
      console.log();
      console.log(
        summary.failed === 0 ? chalk.green("✓") : chalk.red("✗"),
        `Added ${summary.succeeded} key(s), ${summary.failed} failed`
      );
    },
  });

  return summary.failed > 0 ? EXIT_ERROR : EXIT_SUCCESS;
}
