export const REDACTED = "[REDACTED]";

/**
 * Replace every occurrence of each secret in `text`. Empty secrets are ignored.
 */
export function maskSecrets(text: string, secrets: readonly string[]): string {
  let masked = text;
  for (const secret of secrets) {
    if (secret.length === 0) continue;
    // split/join for global replace (avoids regex escaping issues)
    masked = masked.split(secret).join(REDACTED);
  }
  return masked;
}
