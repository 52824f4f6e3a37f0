import { spawn, type ChildProcess, type StdioOptions } from "node:child_process";

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  env?: NodeJS.ProcessEnv;
  /**
   * Hand the terminal's stdin and stderr to the child so it can prompt.
   * stdout is still captured.
   */
  interactive?: boolean;
}

export type CommandRunner = (cmd: string[], options?: RunOptions) => Promise<CommandResult>;

// Exit status shells use for "command not found"
const EXIT_NOT_FOUND = 127;

const active = new Set<ChildProcess>();

/**
 * Run a command and collect its output
 */
export const runCommand: CommandRunner = (cmd, options = {}) => {
  const [file, ...args] = cmd;
  if (!file) {
    return Promise.reject(new Error("No command given"));
  }

  const stdio: StdioOptions = options.interactive
    ? ["inherit", "pipe", "inherit"]
    : ["ignore", "pipe", "pipe"];

  return new Promise((resolve) => {
    const child = spawn(file, args, { env: options.env ?? process.env, stdio });
    active.add(child);

    let stdout = "";
    let stderr = "";
    child.stdout?.on("data", (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr?.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    child.on("error", (err) => {
      active.delete(child);
      resolve({ exitCode: EXIT_NOT_FOUND, stdout: "", stderr: err.message });
    });

    child.on("close", (code) => {
      active.delete(child);
      resolve({
        exitCode: code ?? 1,
        stdout: stdout.trim(),
        stderr: stderr.trim(),
      });
    });
  });
};

/**
 * Kill every child started by runCommand that is still running
 */
export function killActiveCommands(signal: NodeJS.Signals = "SIGTERM"): number {
  let killed = 0;
  for (const child of active) {
    if (child.kill(signal)) killed++;
  }
  active.clear();
  return killed;
}
