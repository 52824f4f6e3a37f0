import { afterEach, describe, expect, it } from "vitest";
import { killActiveCommands, runCommand } from "./process";

describe("runCommand", () => {
  afterEach(() => {
    killActiveCommands("SIGKILL");
  });

  it("returns the exit code with trimmed stdout and stderr", async () => {
    const result = await runCommand([
      "sh",
      "-c",
      "printf ' out \\n'; printf ' err \\n' >&2; exit 3",
    ]);

    expect(result).toEqual({ exitCode: 3, stdout: "out", stderr: "err" });
  });

  it("gives the child the environment it is passed", async () => {
    const result = await runCommand(["sh", "-c", 'printf %s "$BWSSH_TEST_VALUE"'], {
      env: { PATH: process.env.PATH, BWSSH_TEST_VALUE: "from-env" },
    });

    expect(result.stdout).toBe("from-env");
  });

  it("captures stdout of an interactive command", async () => {
    const result = await runCommand(["sh", "-c", "echo session-key"], { interactive: true });

    expect(result).toEqual({ exitCode: 0, stdout: "session-key", stderr: "" });
  });

  it("resolves with 127 when the command does not exist", async () => {
    const result = await runCommand(["bwssh-test-no-such-command"]);

    expect(result.exitCode).toBe(127);
    expect(result.stdout).toBe("");
    expect(result.stderr).toContain("ENOENT");
  });

  it("rejects an empty command", async () => {
    await expect(runCommand([])).rejects.toThrow("No command given");
  });
});

describe("killActiveCommands", () => {
  it("returns 0 when nothing is running", () => {
    expect(killActiveCommands()).toBe(0);
  });

  it("kills a running child and forgets it", async () => {
    const running = runCommand(["sh", "-c", "exec sleep 30"]);

    expect(killActiveCommands()).toBe(1);

    const result = await running;
    expect(result.exitCode).not.toBe(0);
    expect(killActiveCommands()).toBe(0);
  });

  it("does not count children that already finished", async () => {
    await runCommand(["sh", "-c", "exit 0"]);

    expect(killActiveCommands()).toBe(0);
  });
});
