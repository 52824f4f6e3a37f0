import { constants } from "node:fs";
import { access, mkdtemp, rm, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { AgentRegistrationFailed, KeyFileNotFound } from "../errors";
import type { KeyRegistrar } from "../types";
import { maskSecrets } from "../utils/mask";
import { debug, type OutputOptions } from "../utils/output";
import { runCommand, type CommandRunner } from "../utils/process";

export const PASSPHRASE_ENV = "BWSSH_PASSPHRASE";

// ssh-add runs this instead of prompting; the passphrase stays in the environment.
// ssh-add re-asks with "Bad passphrase, try again..." and only gives up on a
// failed answer, so the retry prompt must not be answered.
export const ASKPASS_SCRIPT = [
  "#!/bin/sh",
  'case "$1" in',
  '  "Bad passphrase"*) exit 1 ;;',
  "esac",
  `printf '%s\\n' "$${PASSPHRASE_ENV}"`,
  "",
].join("\n");

export interface SshAgentOptions extends OutputOptions {
  command?: string;
  runner?: CommandRunner;
  env?: NodeJS.ProcessEnv;
}

/**
 * Adds keys to the running ssh-agent with ssh-add
 */
export class SshAgent implements KeyRegistrar {
  private readonly options: SshAgentOptions;
  private readonly runner: CommandRunner;
  private readonly env: NodeJS.ProcessEnv;
  private readonly command: string;

  constructor(options: SshAgentOptions = {}) {
    this.options = options;
    this.runner = options.runner ?? runCommand;
    this.env = options.env ?? process.env;
    this.command = options.command ?? "ssh-add";
  }

  async registerKey(keyPath: string, secret: string): Promise<void> {
    await assertReadableFile(keyPath);

    if (!this.env.SSH_AUTH_SOCK) {
      throw new AgentRegistrationFailed(keyPath, "no agent socket (SSH_AUTH_SOCK is not set)");
    }

    const dir = await mkdtemp(join(tmpdir(), "bwssh-"));
    try {
      const askpass = join(dir, "askpass");
      await writeFile(askpass, ASKPASS_SCRIPT, { mode: 0o700 });

      debug(this.options, `Running ${this.command} ${keyPath}`);
      const result = await this.runner([this.command, keyPath], {
        env: {
          ...this.env,
          SSH_ASKPASS: askpass,
          SSH_ASKPASS_REQUIRE: "force",
          DISPLAY: this.env.DISPLAY || "none",
          [PASSPHRASE_ENV]: secret,
        },
      });

      if (result.exitCode !== 0) {
        const reason = maskSecrets(result.stderr, [secret]) || `${this.command} exited with code ${result.exitCode}`;
        throw new AgentRegistrationFailed(keyPath, reason);
      }
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }
}

async function assertReadableFile(keyPath: string): Promise<void> {
  let isFile: boolean;
  try {
    const info = await stat(keyPath);
    isFile = info.isFile();
    await access(keyPath, constants.R_OK);
  } catch {
    throw new KeyFileNotFound(keyPath);
  }

  if (!isFile) {
    throw new KeyFileNotFound(keyPath);
  }
}
