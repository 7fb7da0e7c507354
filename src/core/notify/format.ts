/**
 * Price and percent formatting for chat messages
 */

export function formatPrice(minor: number, symbol = "€"): string {
  return `${symbol}${(minor / 100).toFixed(2)}`;
}

/** One decimal, half away from zero on the decimal digit */
export function formatPercent(percent: number): string {
  return `${(Math.round(percent * 10) / 10).toFixed(1)}%`;
}
