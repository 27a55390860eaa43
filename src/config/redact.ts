export const REDACTED_SENTINEL = "__REDACTED__";

const SENSITIVE_KEY_PATTERNS = [/token/i, /password/i, /secret/i, /api.?key/i];

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Deep-walk a value and replace fields whose key looks sensitive with the
 * redaction sentinel. Unset secrets stay unset so `config` output still shows
 * what is missing.
 */
export function redactConfigValue(value: unknown): unknown {
  if (value === null || value === undefined || typeof value !== "object") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(redactConfigValue);
  }
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (isSensitiveKey(key) && entry !== null && entry !== undefined && entry !== "") {
      result[key] = REDACTED_SENTINEL;
    } else {
      result[key] = redactConfigValue(entry);
    }
  }
  return result;
}
