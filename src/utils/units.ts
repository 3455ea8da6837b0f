import { formatEther, parseEther } from 'viem';

/**
 * Parses a decimal string ("1.5") into an 18-decimal fixed-point amount.
 * Throws on anything that is not a plain non-negative decimal.
 */
export function parseAmount(value: string): bigint {
    const trimmed = value.trim();
    if (!/^\d+(\.\d+)?$/.test(trimmed)) {
        throw new Error(`Invalid amount: "${value}"`);
    }
    return parseEther(trimmed);
}

export function formatAmount(value: bigint): string {
    return formatEther(value);
}
