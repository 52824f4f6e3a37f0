import { describe, it, expect } from "vitest";
import {
  AgentRegistrationFailed,
  ConfigurationError,
  KeyFileNotFound,
  MappingFileError,
  VaultAuthError,
  VaultItemNotFound,
  errorMessage,
  isEntryError,
} from "./errors";

describe("errors", () => {
  it("treats vault and agent failures as per-entry errors", () => {
    expect(isEntryError(new VaultAuthError("locked"))).toBe(true);
    expect(isEntryError(new VaultItemNotFound("item1"))).toBe(true);
    expect(isEntryError(new KeyFileNotFound("/k"))).toBe(true);
    expect(isEntryError(new AgentRegistrationFailed("/k", "refused"))).toBe(true);
  });

  it("treats config and mapping failures as fatal", () => {
    expect(isEntryError(new ConfigurationError("missing"))).toBe(false);
    expect(isEntryError(new MappingFileError("/m.csv", "ENOENT"))).toBe(false);
    expect(isEntryError(new Error("other"))).toBe(false);
  });

  it("names the item or key in messages", () => {
    expect(new VaultItemNotFound("item1").message).toBe(
      "Vault item item1 not found in the configured folder"
    );
    expect(new KeyFileNotFound("/home/u/.ssh/id_a").message).toBe(
      "Private key at /home/u/.ssh/id_a does not exist or is not readable"
    );
    expect(new MappingFileError("/m.csv", "ENOENT").code).toBe("mapping_file_error");
    expect(new VaultAuthError("x").name).toBe("VaultAuthError");
  });

  it("formats unknown thrown values", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
  });
});
