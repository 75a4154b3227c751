/**
 * Helpers shared by model client factories.
 */

/** Reads an environment variable; undefined when unset or outside Node. */
export function readEnvVar(key: string): string | undefined {
  if (typeof process === "undefined" || typeof process.env === "undefined") {
    return undefined;
  }
  const value = process.env[key];
  return typeof value === "string" ? value : undefined;
}

export function isNonEmpty(value: string | undefined): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

/** First non-empty value among `keys`, trimmed. */
export function readFirstEnvVar(...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = readEnvVar(key);
    if (isNonEmpty(value)) return value.trim();
  }
  return undefined;
}
