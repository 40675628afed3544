import type { AccountType } from '@ducat-ledger/shared';
import { Money } from '../money/money.js';
import { LedgerError } from '../errors.js';
import { Account, normalSide } from './account.js';
import { Transaction } from './transaction.js';

/**
 * Signed amount against an account, as passed to recordTransaction().
 * A non-negative amount increases the account, a negative one decreases it.
 * Plain numbers are not accepted: amounts are decimal strings or Money.
 */
export interface LedgerEntryInput {
    account: Account;
    amount: Money | string;
}

/**
 * Owns the chart of accounts and the transaction log.
 *
 * Every balance change goes through post(). After each successful post
 * the debit-normalized balances of all accounts sum to zero.
 *
 * Single writer: nothing here is safe to interleave across callers.
 */
export class Ledger {
    readonly name: string;
    private readonly _accounts: Account[] = [];
    private readonly _accountsByName = new Map<string, Account>();
    private readonly _transactions: Transaction[] = [];

    constructor(name: string) {
        this.name = name;
    }

    /**
     * Accounts in chart-of-accounts (insertion) order.
     */
    get accounts(): readonly Account[] {
        return this._accounts;
    }

    get transactions(): readonly Transaction[] {
        return this._transactions;
    }

    /**
     * Names are stored trimmed, the same form both import paths read them
     * in; an empty name is rejected.
     */
    createAccount(name: string, type: AccountType): Account {
        const trimmed = name.trim();
        if (trimmed === '') {
            throw new LedgerError('INVALID_ACCOUNT_NAME', `Account name must not be empty in ledger "${this.name}"`);
        }
        if (this._accountsByName.has(trimmed)) {
            throw new LedgerError('DUPLICATE_ACCOUNT', `Account "${trimmed}" already exists in ledger "${this.name}"`);
        }
        const account = new Account(trimmed, type);
        this._accounts.push(account);
        this._accountsByName.set(trimmed, account);
        return account;
    }

    /**
     * Exact lookup of the trimmed name.
     */
    getAccount(name: string): Account | undefined {
        return this._accountsByName.get(name.trim());
    }

    /**
     * Existing account by name, or a new one of the given type.
     * Account types never change: asking for an existing name with a
     * different type is an error.
     */
    getOrCreateAccount(name: string, type: AccountType): Account {
        const existing = this.getAccount(name);
        if (!existing) {
            return this.createAccount(name, type);
        }
        if (existing.type !== type) {
            throw new LedgerError(
                'ACCOUNT_TYPE_CONFLICT',
                `Account "${existing.name}" is ${existing.type}, cannot use it as ${type}`
            );
        }
        return existing;
    }

    /**
     * Record a transaction from signed entries.
     *
     * For ASSET/EXPENSE accounts a non-negative amount is a debit and a
     * negative one a credit of its absolute value; LIABILITY, EQUITY and
     * REVENUE accounts take the opposite mapping.
     *
     * Throws UnbalancedTransactionError (and changes nothing) when the
     * routed debits and credits differ.
     */
    recordTransaction(date: string | Date, description: string, ...entries: LedgerEntryInput[]): Transaction {
        const transaction = new Transaction(date, description);

        for (const entry of entries) {
            const amount = Money.of(entry.amount);
            const growsOnDebit = normalSide(entry.account.type) === 'debit';
            const increases = !amount.isNegative();

            if (growsOnDebit === increases) {
                transaction.addDebit({ account: entry.account, amount: amount.abs() });
            } else {
                transaction.addCredit({ account: entry.account, amount: amount.abs() });
            }
        }

        return this.post(transaction);
    }

    /**
     * Post a built transaction and append it to the log.
     * Validation (ownership, balance) completes before any account moves.
     */
    post(transaction: Transaction): Transaction {
        for (const entry of [...transaction.debits, ...transaction.credits]) {
            if (this._accountsByName.get(entry.account.name) !== entry.account) {
                throw new LedgerError(
                    'UNKNOWN_ACCOUNT',
                    `Account "${entry.account.name}" does not belong to ledger "${this.name}"`
                );
            }
        }

        transaction.post();
        this._transactions.push(transaction);
        return transaction;
    }

    /**
     * Sum of debit-normalized balances; zero while the books are consistent.
     */
    normalizedBalanceTotal(): Money {
        return Money.sum(this._accounts.map((a) => a.normalizedBalance));
    }
}
