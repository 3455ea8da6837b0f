/**
 * ReserveBank — the reserve asset traders pay with, modelled as native value.
 *
 * Balances live in a TokenLedger. Accounts may register a receive hook that
 * runs after value arrives, the way a contract's fallback does; a hook that
 * throws rejects the payment, which is then undone.
 */

import type { Address } from 'viem';
import { LedgerError } from './LedgerError.js';
import { TokenLedger, type LedgerStore, type Transaction } from './TokenLedger.js';

export interface ReceiveContext {
    from: Address;
    to: Address;
    amount: bigint;
}

export type ReceiveHook = (payment: ReceiveContext) => Promise<void> | void;

export interface ReserveTransferOptions {
    /** Run the recipient's receive hook. Reversals pass false. */
    notify?: boolean;
    metadata?: Record<string, unknown>;
}

export class ReserveBank {
    private readonly ledger: TokenLedger;
    private readonly receivers = new Map<string, ReceiveHook>();

    constructor(symbol: string = 'CORE', store?: LedgerStore) {
        this.ledger = new TokenLedger(symbol, store);
    }

    get symbol(): string {
        return this.ledger.symbol;
    }

    /**
     * Credit an account with fresh reserve (faucet / bridge-in).
     */
    async deposit(account: Address, amount: bigint): Promise<Transaction> {
        return this.ledger.mint(account, amount, { source: 'deposit' });
    }

    async transfer(
        from: Address,
        to: Address,
        amount: bigint,
        options: ReserveTransferOptions = {},
    ): Promise<Transaction> {
        const { notify = true, metadata = {} } = options;
        const tx = await this.ledger.transfer(from, to, amount, notify ? 'transfer' : 'reversal', metadata);

        const hook = notify ? this.receivers.get(to.toLowerCase()) : undefined;
        if (hook) {
            try {
                await hook({ from, to, amount });
            } catch (err) {
                await this.ledger.transfer(to, from, amount, 'reversal', { txRef: tx.txId });
                const cause = err instanceof Error ? err : new Error(String(err));
                throw new LedgerError(
                    'RECIPIENT_REJECTED',
                    `${to} rejected ${amount} ${this.symbol} from ${from}: ${cause.message}`,
                    cause,
                );
            }
        }
        return tx;
    }

    async balanceOf(account: Address): Promise<bigint> {
        return this.ledger.balanceOf(account);
    }

    async getTransactionHistory(account: Address): Promise<Transaction[]> {
        return this.ledger.getTransactionHistory(account);
    }

    registerReceiver(account: Address, hook: ReceiveHook): void {
        this.receivers.set(account.toLowerCase(), hook);
    }

    unregisterReceiver(account: Address): void {
        this.receivers.delete(account.toLowerCase());
    }
}
