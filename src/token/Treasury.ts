/**
 * Treasury — platform account that collects creation, trading and
 * graduation fees on the reserve asset.
 *
 * Totals are read back from the reserve ledger's history, so payments that
 * were rolled back or reversed by a failed settlement never count.
 */

import type winston from 'winston';
import { getAddress, type Address } from 'viem';
import type { ReserveBank } from './ReserveBank.js';
import type { Transaction } from './TokenLedger.js';
import { createLogger } from '../utils/logger.js';

export interface TreasuryStats {
    currentBalance: bigint;
    totalReceived: bigint;
    totalWithdrawn: bigint;
    withdrawals: number;
}

export class Treasury {
    readonly address: Address;
    readonly owner: Address;
    private readonly logger: winston.Logger;

    constructor(
        address: Address,
        owner: Address,
        private readonly reserve: ReserveBank,
        logger?: winston.Logger,
    ) {
        this.address = getAddress(address);
        this.owner = getAddress(owner);
        this.logger = logger ?? createLogger('info', 'treasury');
    }

    async getBalance(): Promise<bigint> {
        return this.reserve.balanceOf(this.address);
    }

    async getTreasuryStats(): Promise<TreasuryStats> {
        const history = await this.reserve.getTransactionHistory(this.address);

        let totalReceived = 0n;
        let totalWithdrawn = 0n;
        let withdrawals = 0;
        for (const tx of history) {
            if (isIncoming(tx)) totalReceived += tx.amount;
            else if (tx.type === 'reversal' && tx.direction === 'debit') totalReceived -= tx.amount;
            else if (tx.type === 'reversal') {
                totalWithdrawn -= tx.amount;
                withdrawals--;
            } else {
                totalWithdrawn += tx.amount;
                withdrawals++;
            }
        }

        return {
            currentBalance: await this.getBalance(),
            totalReceived,
            totalWithdrawn,
            withdrawals,
        };
    }

    /**
     * Send the whole balance to the owner. Returns the amount sent.
     */
    async withdrawAll(caller: Address): Promise<bigint> {
        this.assertOwner(caller);
        const balance = await this.getBalance();
        if (balance === 0n) {
            throw new Error('Treasury: nothing to withdraw');
        }
        await this.reserve.transfer(this.address, this.owner, balance, {
            metadata: { label: 'treasury withdrawal' },
        });
        this.logger.info('Treasury withdrawn', { to: this.owner, amount: balance });
        return balance;
    }

    private assertOwner(caller: Address): void {
        if (caller.toLowerCase() !== this.owner.toLowerCase()) {
            throw new Error(`Treasury: ${caller} is not the owner`);
        }
    }
}

function isIncoming(tx: Transaction): boolean {
    return tx.direction === 'credit' && tx.type !== 'reversal';
}
