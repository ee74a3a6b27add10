const BINARY_MULTIPLIERS: Record<string, number> = {
  Ki: 1024,
  Mi: 1024 ** 2,
  Gi: 1024 ** 3,
  Ti: 1024 ** 4,
  Pi: 1024 ** 5,
  Ei: 1024 ** 6,
};

const DECIMAL_MULTIPLIERS: Record<string, number> = {
  k: 1000,
  M: 1000 ** 2,
  G: 1000 ** 3,
  T: 1000 ** 4,
  P: 1000 ** 5,
  E: 1000 ** 6,
};

/**
 * Numeric value of a resource quantity such as "500m", "0.5" or "1Gi".
 * Null when the text is not a quantity.
 */
export function parseQuantity(value: string | number): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  const match = /^(\d+(?:\.\d+)?)([a-zA-Z]*)$/.exec(value.trim());
  if (!match) return null;
  const [, digits, suffix] = match;
  const amount = Number(digits);
  if (suffix === '') return amount;
  if (suffix === 'm') return amount / 1000;
  const multiplier = BINARY_MULTIPLIERS[suffix] ?? DECIMAL_MULTIPLIERS[suffix];
  return multiplier === undefined ? null : amount * multiplier;
}

/** A requests or limits map with every parseable quantity replaced by its value. */
export function quantityValues(quantities: Record<string, string | number> | undefined): Record<string, string | number> | undefined {
  if (!quantities) return undefined;
  return Object.fromEntries(
    Object.entries(quantities).map(([resource, quantity]) => [resource, parseQuantity(quantity) ?? quantity]),
  );
}
