import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import {
  debug,
  error,
  hint,
  info,
  isHuman,
  jsonOutput,
  type OutputOptions,
  output,
  success,
  warn,
} from "./output";

describe("output utilities", () => {
  let consoleSpy: MockInstance;
  let consoleOutput: string[];

  beforeEach(() => {
    consoleOutput = [];
    consoleSpy = vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
      consoleOutput.push(args.join(" "));
    });
  });

  afterEach(() => {
    consoleSpy.mockRestore();
  });

  describe("jsonOutput", () => {
    it("outputs JSON with 2-space indent", () => {
      jsonOutput({ key: "value" });
      expect(consoleOutput[0]).toBe('{\n  "key": "value"\n}');
    });

    it("handles arrays", () => {
      jsonOutput({ items: [1, 2] });
      expect(consoleOutput[0]).toBe('{\n  "items": [\n    1,\n    2\n  ]\n}');
    });
  });

  describe("output", () => {
    it("calls json handler when json option is true", () => {
      let humanCalled = false;

      output({ json: true }, {
        json: () => ({ success: true }),
        human: () => {
          humanCalled = true;
        },
      });

      expect(humanCalled).toBe(false);
      expect(consoleOutput).toEqual(['{\n  "success": true\n}']);
    });

    it("calls quiet handler when quiet option is true", () => {
      const options: OutputOptions = { quiet: true };
      let quietCalled = false;
      let humanCalled = false;

      output(options, {
        quiet: () => {
          quietCalled = true;
        },
        human: () => {
          humanCalled = true;
        },
      });

      expect(quietCalled).toBe(true);
      expect(humanCalled).toBe(false);
    });

    it("json takes precedence over quiet", () => {
      let quietCalled = false;

      output({ json: true, quiet: true }, {
        json: () => ({ ok: 1 }),
        quiet: () => {
          quietCalled = true;
        },
        human: () => {},
      });

      expect(quietCalled).toBe(false);
      expect(consoleOutput).toHaveLength(1);
    });

    it("falls back to human when json handler not provided", () => {
      let humanCalled = false;

      output({ json: true }, {
        human: () => {
          humanCalled = true;
        },
      });

      expect(humanCalled).toBe(true);
    });
  });

  describe("isHuman", () => {
    it("is true only without json and quiet", () => {
      expect(isHuman({})).toBe(true);
      expect(isHuman({ debug: true })).toBe(true);
      expect(isHuman({ json: true })).toBe(false);
      expect(isHuman({ quiet: true })).toBe(false);
    });
  });

  describe("styled output functions", () => {
    let consoleErrorSpy: MockInstance;
    let errorOutput: string[];

    beforeEach(() => {
      errorOutput = [];
      consoleErrorSpy = vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
        errorOutput.push(args.join(" "));
      });
    });

    afterEach(() => {
      consoleErrorSpy.mockRestore();
    });

    it("success, info and warn write to stdout", () => {
      success("Key added");
      info("Adding keys");
      warn("Skipped line");

      expect(consoleOutput).toHaveLength(3);
      expect(consoleOutput[0]).toContain("Key added");
      expect(consoleOutput[1]).toContain("Adding keys");
      expect(consoleOutput[2]).toContain("Skipped line");
      expect(errorOutput).toEqual([]);
    });

    it("error outputs to stderr", () => {
      error("Error message");
      expect(errorOutput).toHaveLength(1);
      expect(errorOutput[0]).toContain("Error message");
      expect(consoleOutput).toEqual([]);
    });

    it("hint outputs indented text", () => {
      hint("Hint text");
      expect(consoleOutput[0]).toContain("  Hint text");
    });

    it("debug writes to stderr only when enabled", () => {
      debug({}, "hidden");
      expect(errorOutput).toEqual([]);

      debug({ debug: true }, "Running bw sync");
      expect(errorOutput).toHaveLength(1);
      expect(errorOutput[0]).toContain("[debug] Running bw sync");
    });
  });
});
