import { Money } from '../money/money.js';
import { LedgerError, MalformedRecordError, UnbalancedTransactionError } from '../errors.js';
import { toIsoDate } from '../utils/date-parse.js';
import type { Account } from './account.js';

/**
 * One leg of a transaction. The amount is never negative; whether it is a
 * debit or a credit depends on which list it is filed in.
 */
export interface TransactionEntry {
    readonly account: Account;
    readonly amount: Money;
}

/**
 * Atomic group of debit and credit entries that must net to zero.
 *
 * Entries are append-only. Once posted, the transaction is frozen.
 */
export class Transaction {
    readonly date: string;
    readonly description: string;
    private readonly _debits: TransactionEntry[] = [];
    private readonly _credits: TransactionEntry[] = [];
    private _posted = false;

    /**
     * @param date - ISO YYYY-MM-DD string or Date (read in UTC)
     */
    constructor(date: string | Date, description: string) {
        const isoDate = toIsoDate(date);
        if (!isoDate) {
            throw new MalformedRecordError(`Invalid transaction date "${String(date)}", expected YYYY-MM-DD`);
        }
        this.date = isoDate;
        this.description = description;
    }

    get debits(): readonly TransactionEntry[] {
        return this._debits;
    }

    get credits(): readonly TransactionEntry[] {
        return this._credits;
    }

    get posted(): boolean {
        return this._posted;
    }

    addDebit(entry: TransactionEntry): void {
        this.assertAppendable(entry, 'debit');
        this._debits.push(entry);
    }

    addCredit(entry: TransactionEntry): void {
        this.assertAppendable(entry, 'credit');
        this._credits.push(entry);
    }

    debitTotal(): Money {
        return Money.sum(this._debits.map((e) => e.amount));
    }

    creditTotal(): Money {
        return Money.sum(this._credits.map((e) => e.amount));
    }

    /**
     * True iff both sides have entries and their totals are exactly equal.
     */
    isBalanced(): boolean {
        return this.imbalance() === null;
    }

    /**
     * Describe why the transaction is not balanced, or null if it is.
     */
    imbalance(): string | null {
        if (this._debits.length === 0) {
            return `Transaction "${this.description}" has no debit entries`;
        }
        if (this._credits.length === 0) {
            return `Transaction "${this.description}" has no credit entries`;
        }
        const debits = this.debitTotal();
        const credits = this.creditTotal();
        if (!debits.equals(credits)) {
            return `Transaction "${this.description}" unbalanced: debits=${debits.toString()}, credits=${credits.toString()}`;
        }
        return null;
    }

    /**
     * Apply every debit, then every credit, in entry order.
     * Callers go through Ledger.post(), which also records the transaction.
     */
    post(): void {
        if (this._posted) {
            throw new LedgerError('ALREADY_POSTED', `Transaction "${this.description}" has already been posted`);
        }
        const problem = this.imbalance();
        if (problem) {
            throw new UnbalancedTransactionError(problem);
        }

        for (const entry of this._debits) {
            entry.account.debit(entry.amount);
        }
        for (const entry of this._credits) {
            entry.account.credit(entry.amount);
        }
        this._posted = true;
    }

    toString(): string {
        const lines = [`Transaction: ${this.date} - ${this.description}`];

        lines.push('  Debits:');
        for (const entry of this._debits) {
            lines.push(`    ${entry.account.name}: ${entry.amount.toString()}`);
        }

        lines.push('  Credits:');
        for (const entry of this._credits) {
            lines.push(`    ${entry.account.name}: ${entry.amount.toString()}`);
        }

        return lines.join('\n');
    }

    private assertAppendable(entry: TransactionEntry, side: 'debit' | 'credit'): void {
        if (this._posted) {
            throw new LedgerError('ALREADY_POSTED', `Cannot add a ${side} to posted transaction "${this.description}"`);
        }
        if (entry.amount.isNegative()) {
            throw new MalformedRecordError(
                `Negative ${side} amount ${entry.amount.toString()} for account "${entry.account.name}"`
            );
        }
    }
}
