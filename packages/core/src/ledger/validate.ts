import type { LedgerValidationResult } from '@ducat-ledger/shared';
import { Money } from '../money/money.js';
import type { Ledger } from './ledger.js';
import type { Transaction } from './transaction.js';

/**
 * Validate a single transaction balances.
 *
 * @param transaction - Transaction to check
 * @param position - 1-based position in the log, for messages
 */
export function validateTransaction(transaction: Transaction, position: number): {
    valid: boolean;
    debit_total: string;
    credit_total: string;
    error?: string;
} {
    const debitTotal = transaction.debitTotal();
    const creditTotal = transaction.creditTotal();
    const problem = transaction.imbalance();

    return {
        valid: problem === null,
        debit_total: debitTotal.toString(),
        credit_total: creditTotal.toString(),
        error: problem === null ? undefined : `Transaction ${position} (${transaction.date}): ${problem}`,
    };
}

/**
 * Re-check a whole ledger: every logged transaction balances, log-wide
 * debits equal credits, and account balances net to zero.
 *
 * Posting already enforces all three; this is the audit a caller runs
 * after an import or before trusting a report.
 */
export function validateLedger(ledger: Ledger): LedgerValidationResult {
    const errors: string[] = [];
    let totalDebits = Money.ZERO;
    let totalCredits = Money.ZERO;

    ledger.transactions.forEach((transaction, index) => {
        const result = validateTransaction(transaction, index + 1);
        if (!result.valid && result.error) {
            errors.push(result.error);
        }
        totalDebits = totalDebits.plus(Money.of(result.debit_total));
        totalCredits = totalCredits.plus(Money.of(result.credit_total));
    });

    const difference = totalDebits.minus(totalCredits).abs();
    if (!difference.isZero()) {
        errors.push(
            `Journal unbalanced: total debits=${totalDebits.toString()}, ` +
            `total credits=${totalCredits.toString()}, difference=${difference.toString()}`
        );
    }

    const residual = ledger.normalizedBalanceTotal();
    if (!residual.isZero()) {
        errors.push(`Account balances do not net to zero: residual=${residual.toString()}`);
    }

    return {
        valid: errors.length === 0,
        total_debits: totalDebits.toString(),
        total_credits: totalCredits.toString(),
        difference: difference.toString(),
        errors,
    };
}
