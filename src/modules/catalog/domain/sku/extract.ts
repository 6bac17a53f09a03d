// A tag-delimited token of uppercase letters, digits and hyphens, e.g. `>FZ8117-100<`.
const SKU_TOKEN_PATTERN = />([A-Z0-9-]+)</;

/**
 * First SKU token embedded in product markup, or '' when there is none.
 */
export function extractSku(markup: unknown): string {
  if (typeof markup !== 'string' || markup.length === 0) {
    return '';
  }

  const match = SKU_TOKEN_PATTERN.exec(markup);
  return match?.[1] ? normalizeSku(match[1]) : '';
}

export function normalizeSku(value: string): string {
  return value.trim().toUpperCase();
}
