export interface Configuration {
  readonly vaultFolderId: string;
  readonly mappingFilePath: string;
  readonly email?: string;
  readonly sync: boolean;
  readonly lockOnExit: boolean;
  readonly bwCommand: string;
  readonly sshAddCommand: string;
}

export interface MappingEntry {
  vaultItemId: string;
  keyPath: string;
  /** 1-based line in the mapping file */
  line: number;
}

export interface MappingResult {
  entries: MappingEntry[];
  warnings: string[];
}

export type RegistrationStatus =
  | "succeeded"
  | "vault_lookup_failed"
  | "agent_registration_failed"
  | "key_file_not_found";

export interface RegistrationResult {
  entry: MappingEntry;
  status: RegistrationStatus;
  message?: string;
}

/**
 * Where passphrases come from. close() runs once after the last lookup.
 */
export interface SecretSource {
  fetchSecret(itemId: string): Promise<string>;
  close(): Promise<void>;
}

export interface KeyRegistrar {
  registerKey(keyPath: string, secret: string): Promise<void>;
}
