export function isRecord(input: unknown): input is Record<string, unknown> {
  return typeof input === 'object' && input !== null && !Array.isArray(input);
}

/**
 * Trimmed string value, or `fallback` when the input is not a non-empty string.
 */
export function readString(input: unknown, fallback = ''): string {
  if (typeof input !== 'string') {
    return fallback;
  }

  const trimmed = input.trim();
  return trimmed.length > 0 ? trimmed : fallback;
}

export function readOptionalString(input: unknown): string | undefined {
  const value = readString(input);
  return value.length > 0 ? value : undefined;
}
