import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { homedir } from "node:os";
import { ConfigurationError, errorMessage } from "../errors";
import type { Configuration } from "../types";

const CONFIG_DIR_NAME = ".bwssh";
const CONFIG_NAME = "config.json";

export const DEFAULTS = {
  sync: true,
  lockOnExit: true,
  bwCommand: "bw",
  sshAddCommand: "ssh-add",
} as const;

/**
 * Expand a leading ~ to the home directory
 */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === "~") return home;
  if (path.startsWith("~/")) return join(home, path.slice(2));
  return path;
}

/**
 * BWSSH_CONFIG, then ./.bwssh/config.json, then ~/.bwssh/config.json
 */
export function findConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
  home: string = homedir()
): string | null {
  if (env.BWSSH_CONFIG) {
    return resolve(cwd, expandHome(env.BWSSH_CONFIG, home));
  }

  const localPath = join(cwd, CONFIG_DIR_NAME, CONFIG_NAME);
  if (existsSync(localPath)) {
    return localPath;
  }

  const globalPath = join(home, CONFIG_DIR_NAME, CONFIG_NAME);
  if (existsSync(globalPath)) {
    return globalPath;
  }

  return null;
}

export function getGlobalConfigPath(home: string = homedir()): string {
  return join(home, CONFIG_DIR_NAME, CONFIG_NAME);
}

export function loadConfig(path?: string): Configuration {
  const configPath = path ? resolve(expandHome(path)) : findConfigPath();

  if (!configPath) {
    throw new ConfigurationError(`No config file found (looked for ${getGlobalConfigPath()})`);
  }

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Could not read config file ${configPath}: ${errorMessage(err)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ConfigurationError(`Invalid JSON in ${configPath}: ${errorMessage(err)}`);
  }

  return parseConfig(raw, dirname(configPath), configPath);
}

/**
 * Validate raw config data. Relative mapping paths resolve against baseDir.
 */
export function parseConfig(raw: unknown, baseDir: string, source = "config"): Configuration {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigurationError(`${source}: expected a JSON object`);
  }

  const fields = new Map(Object.entries(raw));

  const requireString = (name: string): string => {
    const value = fields.get(name);
    if (typeof value !== "string" || value.trim() === "") {
      throw new ConfigurationError(`${source}: "${name}" is required and must be a non-empty string`);
    }
    return value.trim();
  };

  const optionalString = (name: string): string | undefined => {
    const value = fields.get(name);
    if (value === undefined) return undefined;
    if (typeof value !== "string" || value.trim() === "") {
      throw new ConfigurationError(`${source}: "${name}" must be a non-empty string`);
    }
    return value.trim();
  };

  const optionalBoolean = (name: string): boolean | undefined => {
    const value = fields.get(name);
    if (value === undefined) return undefined;
    if (typeof value !== "boolean") {
      throw new ConfigurationError(`${source}: "${name}" must be true or false`);
    }
    return value;
  };

  const vaultFolderId = requireString("vaultFolderId");
  const mappingFilePath = resolve(baseDir, expandHome(requireString("mappingFilePath")));
  const email = optionalString("email");

  const config: Configuration = {
    vaultFolderId,
    mappingFilePath,
    ...(email ? { email } : {}),
    sync: optionalBoolean("sync") ?? DEFAULTS.sync,
    lockOnExit: optionalBoolean("lockOnExit") ?? DEFAULTS.lockOnExit,
    bwCommand: optionalString("bwCommand") ?? DEFAULTS.bwCommand,
    sshAddCommand: optionalString("sshAddCommand") ?? DEFAULTS.sshAddCommand,
  };

  return Object.freeze(config);
}
