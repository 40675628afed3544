import type { AccountType } from '@ducat-ledger/shared';
import { Money } from '../money/money.js';

export type BalanceSide = 'debit' | 'credit';

/**
 * Side on which an account category grows.
 *
 * ASSET, EXPENSE: increased by debits, decreased by credits.
 * LIABILITY, EQUITY, REVENUE: increased by credits, decreased by debits.
 */
export function normalSide(type: AccountType): BalanceSide {
    switch (type) {
        case 'ASSET':
        case 'EXPENSE':
            return 'debit';
        case 'LIABILITY':
        case 'EQUITY':
        case 'REVENUE':
            return 'credit';
    }
}

/**
 * Multiplier applied to a debit for this category (+1 or -1).
 */
export function debitSign(type: AccountType): 1 | -1 {
    return normalSide(type) === 'debit' ? 1 : -1;
}

/**
 * Named, typed balance holder.
 *
 * The balance is positive when the account sits on its normal side.
 * It only moves through debit()/credit(); amounts are validated by the
 * transaction layer before they get here.
 */
export class Account {
    readonly name: string;
    readonly type: AccountType;
    private _balance: Money = Money.ZERO;

    constructor(name: string, type: AccountType) {
        this.name = name;
        this.type = type;
    }

    get balance(): Money {
        return this._balance;
    }

    /**
     * Balance in debit-positive terms, whatever the category.
     * Summed over a ledger this is always zero.
     */
    get normalizedBalance(): Money {
        return debitSign(this.type) === 1 ? this._balance : this._balance.negated();
    }

    debit(amount: Money): void {
        this._balance = debitSign(this.type) === 1
            ? this._balance.plus(amount)
            : this._balance.minus(amount);
    }

    credit(amount: Money): void {
        this._balance = debitSign(this.type) === 1
            ? this._balance.minus(amount)
            : this._balance.plus(amount);
    }

    toString(): string {
        return `${this.name} (${this.type}): ${this._balance.toString()}`;
    }
}
