import type { Address } from 'viem';

// ── Launch ──────────────────────────────────────────────────
export interface TokenLaunchedEvent {
    token: Address;
    curve: Address;
    creator: Address;
    name: string;
    symbol: string;
    basePrice: bigint;
    timestamp: number;
}

// ── Trading ─────────────────────────────────────────────────
export interface TokenTradedEvent {
    token: Address;
    trader: Address;
    curve: Address;
    isBuy: boolean;
    reserveAmount: bigint;
    tokenAmount: bigint;
    newPrice: bigint;
    fee: bigint;
    timestamp: number;
}

export interface LargePurchaseAttemptedEvent {
    token: Address;
    buyer: Address;
    curve: Address;
    attemptedAmount: bigint;
    currentHoldings: bigint;
    maxAllowed: bigint;
    timestamp: number;
}

export type FeeSource = 'creation' | 'trading' | 'graduation';

export interface PlatformFeeCollectedEvent {
    source: Address;
    feeType: FeeSource;
    amount: bigint;
    timestamp: number;
}

// ── Graduation ──────────────────────────────────────────────
export interface TokenGraduatedEvent {
    token: Address;
    creator: Address;
    curve: Address;
    totalRaised: bigint;
    liquidityReserve: bigint;
    creatorBonus: bigint;
    treasuryShare: bigint;
    timestamp: number;
}

export interface LaunchpadEvents {
    'token:launched': (event: TokenLaunchedEvent) => void;
    'token:traded': (event: TokenTradedEvent) => void;
    'purchase:limit-exceeded': (event: LargePurchaseAttemptedEvent) => void;
    'fee:collected': (event: PlatformFeeCollectedEvent) => void;
    'token:graduated': (event: TokenGraduatedEvent) => void;
}

export type LaunchpadEventName = keyof LaunchpadEvents;

export type RecordedEvent = {
    [K in LaunchpadEventName]: { name: K; emitter: Address; payload: Parameters<LaunchpadEvents[K]>[0] };
}[LaunchpadEventName];
