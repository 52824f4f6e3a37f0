export type ErrorCode =
  | "configuration_error"
  | "mapping_file_error"
  | "vault_auth_failed"
  | "vault_item_not_found"
  | "key_file_not_found"
  | "agent_registration_failed";

export class BwsshError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = "BwsshError";
    this.code = code;
  }
}

// Fatal: abort the run before the vault or agent is touched

export class ConfigurationError extends BwsshError {
  constructor(message: string) {
    super("configuration_error", message);
    this.name = "ConfigurationError";
  }
}

export class MappingFileError extends BwsshError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super("mapping_file_error", `Could not read mapping file ${path}: ${reason}`);
    this.name = "MappingFileError";
    this.path = path;
  }
}

// Per entry: recorded and counted, the run continues

export class VaultAuthError extends BwsshError {
  constructor(message: string) {
    super("vault_auth_failed", message);
    this.name = "VaultAuthError";
  }
}

export class VaultItemNotFound extends BwsshError {
  readonly itemId: string;

  constructor(itemId: string, reason = "not found in the configured folder") {
    super("vault_item_not_found", `Vault item ${itemId} ${reason}`);
    this.name = "VaultItemNotFound";
    this.itemId = itemId;
  }
}

export class KeyFileNotFound extends BwsshError {
  readonly keyPath: string;

  constructor(keyPath: string) {
    super("key_file_not_found", `Private key at ${keyPath} does not exist or is not readable`);
    this.name = "KeyFileNotFound";
    this.keyPath = keyPath;
  }
}

export class AgentRegistrationFailed extends BwsshError {
  readonly keyPath: string;

  constructor(keyPath: string, reason: string) {
    super("agent_registration_failed", `Could not add ${keyPath} to ssh-agent: ${reason}`);
    this.name = "AgentRegistrationFailed";
    this.keyPath = keyPath;
  }
}

export type EntryError =
  | VaultAuthError
  | VaultItemNotFound
  | KeyFileNotFound
  | AgentRegistrationFailed;

export function isEntryError(err: unknown): err is EntryError {
  return (
    err instanceof VaultAuthError ||
    err instanceof VaultItemNotFound ||
    err instanceof KeyFileNotFound ||
    err instanceof AgentRegistrationFailed
  );
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
