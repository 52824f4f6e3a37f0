import ora, { type Ora } from "ora";
import { VaultAuthError, VaultItemNotFound } from "../errors";
import type { SecretSource } from "../types";
import { debug, isHuman, warn, type OutputOptions } from "../utils/output";
import { runCommand, type CommandResult, type CommandRunner } from "../utils/process";

// bw prints a punycode deprecation warning on newer Node releases
const BW_ENV = { NODE_OPTIONS: "--no-deprecation" };

// First bw release with --nointeraction
const NO_INTERACTION_SINCE: readonly number[] = [1, 9, 0];

export interface BitwardenOptions extends OutputOptions {
  folderId: string;
  email?: string;
  sync?: boolean;
  lockOnExit?: boolean;
  command?: string;
  /** Allow bw to prompt for the master password */
  interactive?: boolean;
  runner?: CommandRunner;
  env?: NodeJS.ProcessEnv;
}

export interface VaultItem {
  id: string;
  name: string;
  passphrase: string | null;
}

export function parseVersion(text: string): number[] | null {
  const match = text.match(/(\d+)\.(\d+)\.(\d+)/);
  if (!match) return null;
  return [Number(match[1]), Number(match[2]), Number(match[3])];
}

export function supportsNoInteraction(versionText: string): boolean {
  const version = parseVersion(versionText);
  if (!version) return false;

  for (let i = 0; i < NO_INTERACTION_SINCE.length; i++) {
    if (version[i] !== NO_INTERACTION_SINCE[i]) {
      return version[i] > NO_INTERACTION_SINCE[i];
    }
  }
  return true;
}

function toVaultItem(value: unknown): VaultItem | null {
  if (typeof value !== "object" || value === null) return null;
  if (!("id" in value) || typeof value.id !== "string") return null;

  const name = "name" in value && typeof value.name === "string" ? value.name : value.id;
  const login = "login" in value ? value.login : null;
  const passphrase =
    typeof login === "object" &&
    login !== null &&
    "password" in login &&
    typeof login.password === "string" &&
    login.password !== ""
      ? login.password
      : null;

  return { id: value.id, name, passphrase };
}

/**
 * Parse `bw list items` output into items keyed by id
 */
export function parseItems(stdout: string): Map<string, VaultItem> {
  let data: unknown;
  try {
    data = JSON.parse(stdout);
  } catch {
    throw new VaultAuthError("Unexpected output from bw list items (not JSON)");
  }

  if (!Array.isArray(data)) {
    throw new VaultAuthError("Unexpected output from bw list items (not a list)");
  }

  const items = new Map<string, VaultItem>();
  for (const value of data) {
    const item = toVaultItem(value);
    if (item) items.set(item.id, item);
  }
  return items;
}

/**
 * Hide the value following --session in a command line
 */
export function describeCommand(cmd: string[]): string {
  return cmd.map((arg, i) => (cmd[i - 1] === "--session" ? "***" : arg)).join(" ");
}

/**
 * Passphrases from one Bitwarden folder, read through the bw CLI.
 *
 * The session is opened on the first lookup, the folder is listed once and
 * reused for every later lookup. A failed unlock is remembered so the user is
 * not prompted again for each remaining key.
 */
export class BitwardenClient implements SecretSource {
  private readonly options: BitwardenOptions;
  private readonly runner: CommandRunner;
  private readonly env: NodeJS.ProcessEnv;
  private readonly command: string;

  private session: string | null = null;
  private ownsSession = false;
  private items: Map<string, VaultItem> | null = null;
  private failure: VaultAuthError | null = null;
  private extraFlags: string[] | null = null;

  constructor(options: BitwardenOptions) {
    this.options = options;
    this.runner = options.runner ?? runCommand;
    this.env = options.env ?? process.env;
    this.command = options.command ?? "bw";
  }

  get interactive(): boolean {
    return this.options.interactive ?? true;
  }

  async fetchSecret(itemId: string): Promise<string> {
    const items = await this.folderItems();
    const item = items.get(itemId);

    if (!item) {
      throw new VaultItemNotFound(itemId);
    }
    if (item.passphrase === null) {
      throw new VaultItemNotFound(itemId, `(${item.name}) has no passphrase`);
    }

    debug(this.options, `Found passphrase for item ${itemId} (${item.name})`);
    return item.passphrase.replace(/\r?\n$/, "");
  }

  /**
   * Lock the vault again if this client unlocked it
   */
  async close(): Promise<void> {
    const session = this.session;
    this.session = null;
    this.items = null;

    if (!session || !this.ownsSession || this.options.lockOnExit === false) {
      return;
    }

    const result = await this.bw(["lock", "--session", session]);
    this.ownsSession = false;

    if (result.exitCode !== 0 && isHuman(this.options)) {
      warn(`Could not lock the vault${result.stderr ? `: ${result.stderr}` : ""}`);
    }
  }

  private async folderItems(): Promise<Map<string, VaultItem>> {
    if (this.failure) throw this.failure;
    if (this.items) return this.items;

    try {
      const session = await this.getSession();
      this.items = await this.listFolder(session);
      return this.items;
    } catch (err) {
      if (err instanceof VaultAuthError) {
        this.failure = err;
      }
      throw err;
    }
  }

  private async getSession(): Promise<string> {
    if (this.session) return this.session;

    const existing = this.env.BW_SESSION;
    if (existing) {
      debug(this.options, "Using existing session from BW_SESSION");
      this.session = existing;
      return existing;
    }

    if (!this.interactive) {
      throw new VaultAuthError(
        "Vault is locked and interactive unlock is disabled (set BW_SESSION)"
      );
    }

    const check = await this.bw(["login", "--check", "--quiet"]);
    const operation = check.exitCode === 0 ? "unlock" : "login";
    debug(this.options, operation === "unlock" ? "Vault is locked" : "Not logged in");

    const args = operation === "login" && this.options.email
      ? ["login", this.options.email, "--raw"]
      : [operation, "--raw"];
    const result = await this.bw(args, true);
    const session = result.stdout.trim();

    if (result.exitCode !== 0 || !session) {
      throw new VaultAuthError(
        operation === "unlock" ? "Could not unlock the vault" : "Could not log in to the vault"
      );
    }

    this.session = session;
    this.ownsSession = true;
    return session;
  }

  private async listFolder(session: string): Promise<Map<string, VaultItem>> {
    const spinner: Ora | null =
      isHuman(this.options) && process.stderr.isTTY ? ora("Syncing vault...").start() : null;

    try {
      if (this.options.sync ?? true) {
        const synced = await this.bw(["sync", "--session", session]);
        if (synced.exitCode !== 0) {
          throw new VaultAuthError(`Could not sync the vault${stderrSuffix(synced)}`);
        }
      }

      if (spinner) spinner.text = "Reading folder items...";
      debug(this.options, `Folder ID: ${this.options.folderId}`);

      const listed = await this.bw([
        "list", "items",
        "--folderid", this.options.folderId,
        "--session", session,
      ]);
      if (listed.exitCode !== 0) {
        throw new VaultAuthError(
          `Could not list items in folder ${this.options.folderId}${stderrSuffix(listed)}`
        );
      }

      const items = parseItems(listed.stdout);
      debug(this.options, `Folder has ${items.size} item(s)`);
      return items;
    } finally {
      spinner?.stop();
    }
  }

  private async bw(args: string[], interactive = false): Promise<CommandResult> {
    const flags = this.interactive ? [] : await this.noInteractionFlags();
    const cmd = [this.command, ...args, ...flags];
    debug(this.options, `Running ${describeCommand(cmd)}`);

    return this.runner(cmd, {
      env: { ...this.env, ...BW_ENV },
      interactive,
    });
  }

  private async noInteractionFlags(): Promise<string[]> {
    if (this.extraFlags) return this.extraFlags;

    const result = await this.runner([this.command, "--version"], {
      env: { ...this.env, ...BW_ENV },
    });
    debug(this.options, `bw version ${result.stdout || "unknown"}`);

    this.extraFlags =
      result.exitCode === 0 && supportsNoInteraction(result.stdout) ? ["--nointeraction"] : [];
    return this.extraFlags;
  }
}

function stderrSuffix(result: CommandResult): string {
  return result.stderr ? `: ${result.stderr}` : "";
}
