/**
 * TokenLedger — fungible balance sheet for one asset.
 *
 * Tracks balances, allowances and transaction history per account.
 * Backs both the launched token and the reserve asset (see ReserveBank).
 */

import { getAddress, type Address } from 'viem';
import { LedgerError } from './LedgerError.js';
import { generateTxId } from '../utils/uuid.js';
import { nowSeconds } from '../utils/timestamp.js';

export type TransactionType = 'mint' | 'transfer' | 'reversal';

export interface Transaction {
    txId: string;
    account: Address;
    counterparty: Address | null;
    amount: bigint;
    type: TransactionType;
    direction: 'credit' | 'debit';
    timestamp: number;
    metadata: Record<string, unknown>;
}

export interface LedgerEntry {
    _id: Address;
    balance: bigint;
    allowances: Record<string, bigint>;
    transactions: Transaction[];
}

export interface LedgerStore {
    put(entry: LedgerEntry): Promise<void>;
    get(id: Address): Promise<LedgerEntry | null>;
    del(id: Address): Promise<void>;
    all(): Promise<Array<{ key: Address; value: LedgerEntry }>>;
}

/**
 * Default store: a Map living as long as the ledger.
 */
export class InMemoryLedgerStore implements LedgerStore {
    private readonly data = new Map<Address, LedgerEntry>();

    async put(entry: LedgerEntry): Promise<void> {
        this.data.set(entry._id, entry);
    }

    async get(id: Address): Promise<LedgerEntry | null> {
        return this.data.get(id) ?? null;
    }

    async del(id: Address): Promise<void> {
        this.data.delete(id);
    }

    async all(): Promise<Array<{ key: Address; value: LedgerEntry }>> {
        return Array.from(this.data.entries()).map(([key, value]) => ({ key, value }));
    }
}

export class TokenLedger {
    private totalSupply = 0n;

    constructor(
        readonly symbol: string,
        private readonly store: LedgerStore = new InMemoryLedgerStore(),
    ) { }

    /**
     * Create new units out of thin air. Only the launch factory and the
     * reserve faucet mint.
     */
    async mint(to: Address, amount: bigint, metadata: Record<string, unknown> = {}): Promise<Transaction> {
        assertPositive(amount);
        const tx = await this.credit(to, null, amount, 'mint', metadata);
        this.totalSupply += amount;
        return tx;
    }

    /**
     * Move `amount` from `from` to `to`. Throws if `from` cannot cover it.
     */
    async transfer(
        from: Address,
        to: Address,
        amount: bigint,
        type: TransactionType = 'transfer',
        metadata: Record<string, unknown> = {},
    ): Promise<Transaction> {
        assertPositive(amount);
        const debit = await this.debit(from, to, amount, type, metadata);
        await this.credit(to, from, amount, type, { ...metadata, txRef: debit.txId });
        return debit;
    }

    /**
     * Move `amount` out of `from` on behalf of `spender`, consuming allowance.
     */
    async transferFrom(
        spender: Address,
        from: Address,
        to: Address,
        amount: bigint,
        metadata: Record<string, unknown> = {},
    ): Promise<Transaction> {
        assertPositive(amount);
        const entry = await this.getOrCreateEntry(from);
        const allowed = entry.allowances[getAddress(spender)] ?? 0n;
        if (allowed < amount) {
            throw new LedgerError(
                'INSUFFICIENT_ALLOWANCE',
                `Insufficient ${this.symbol} allowance for ${spender} on ${from}: has ${allowed}, needs ${amount}`,
            );
        }
        if (entry.balance < amount) {
            throw insufficientBalance(this.symbol, from, entry.balance, amount);
        }
        entry.allowances[getAddress(spender)] = allowed - amount;
        await this.store.put(entry);
        return this.transfer(from, to, amount, 'transfer', { ...metadata, spender });
    }

    async approve(owner: Address, spender: Address, amount: bigint): Promise<void> {
        if (amount < 0n) {
            throw new LedgerError('INVALID_AMOUNT', `Allowance must not be negative, got ${amount}`);
        }
        const entry = await this.getOrCreateEntry(owner);
        entry.allowances[getAddress(spender)] = amount;
        await this.store.put(entry);
    }

    async allowance(owner: Address, spender: Address): Promise<bigint> {
        const entry = await this.store.get(getAddress(owner));
        return entry ? (entry.allowances[getAddress(spender)] ?? 0n) : 0n;
    }

    async balanceOf(account: Address): Promise<bigint> {
        const entry = await this.store.get(getAddress(account));
        return entry ? entry.balance : 0n;
    }

    async getTransactionHistory(account: Address): Promise<Transaction[]> {
        const entry = await this.store.get(getAddress(account));
        return entry ? entry.transactions : [];
    }

    getTotalSupply(): bigint {
        return this.totalSupply;
    }

    private async credit(
        account: Address,
        counterparty: Address | null,
        amount: bigint,
        type: TransactionType,
        metadata: Record<string, unknown>,
    ): Promise<Transaction> {
        const entry = await this.getOrCreateEntry(account);
        const tx = this.record(account, counterparty, amount, type, 'credit', metadata);
        entry.balance += amount;
        entry.transactions.push(tx);
        await this.store.put(entry);
        return tx;
    }

    private async debit(
        account: Address,
        counterparty: Address,
        amount: bigint,
        type: TransactionType,
        metadata: Record<string, unknown>,
    ): Promise<Transaction> {
        const entry = await this.getOrCreateEntry(account);
        if (entry.balance < amount) {
            throw insufficientBalance(this.symbol, account, entry.balance, amount);
        }
        const tx = this.record(account, counterparty, amount, type, 'debit', metadata);
        entry.balance -= amount;
        entry.transactions.push(tx);
        await this.store.put(entry);
        return tx;
    }

    private record(
        account: Address,
        counterparty: Address | null,
        amount: bigint,
        type: TransactionType,
        direction: 'credit' | 'debit',
        metadata: Record<string, unknown>,
    ): Transaction {
        return {
            txId: generateTxId(type),
            account,
            counterparty,
            amount,
            type,
            direction,
            timestamp: nowSeconds(),
            metadata,
        };
    }

    private async getOrCreateEntry(account: Address): Promise<LedgerEntry> {
        const id = getAddress(account);
        const existing = await this.store.get(id);
        if (existing) return existing;
        return { _id: id, balance: 0n, allowances: {}, transactions: [] };
    }
}

function assertPositive(amount: bigint): void {
    if (amount <= 0n) {
        throw new LedgerError('INVALID_AMOUNT', `Amount must be positive, got ${amount}`);
    }
}

function insufficientBalance(symbol: string, account: Address, has: bigint, needs: bigint): LedgerError {
    return new LedgerError(
        'INSUFFICIENT_BALANCE',
        `Insufficient ${symbol} balance for ${account}: has ${has}, needs ${needs}`,
    );
}
