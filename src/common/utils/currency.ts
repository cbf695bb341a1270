/**
 * Rounds an amount to two decimals, the precision amounts are stored with.
 * 0.85 * 1000 is 850, not 849.9999999999999.
 */
export function roundCurrency(value: number): number {
    return Math.round(value * 100) / 100;
}
