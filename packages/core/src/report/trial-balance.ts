import { Money } from '../money/money.js';
import { normalSide } from '../ledger/account.js';
import type { Account } from '../ledger/account.js';
import type { Ledger } from '../ledger/ledger.js';
import type { TrialBalance, TrialBalanceLine } from './types.js';

/**
 * Place an account's balance on its natural side. A negative balance
 * (a contra account, an overdrawn asset) goes to the opposite column as
 * its absolute value.
 */
export function trialBalanceLine(account: Account): TrialBalanceLine {
    const balance = account.balance;
    const line: TrialBalanceLine = { name: account.name, type: account.type, debit: null, credit: null };
    if (balance.isZero()) {
        return line;
    }

    const onDebitSide = (normalSide(account.type) === 'debit') !== balance.isNegative();
    if (onDebitSide) {
        line.debit = balance.abs();
    } else {
        line.credit = balance.abs();
    }
    return line;
}

export function trialBalance(ledger: Ledger): TrialBalance {
    const lines = ledger.accounts.map(trialBalanceLine);
    const totalDebits = Money.sum(lines.map((line) => line.debit ?? Money.ZERO));
    const totalCredits = Money.sum(lines.map((line) => line.credit ?? Money.ZERO));

    return {
        lines,
        totalDebits,
        totalCredits,
        balanced: totalDebits.equals(totalCredits),
    };
}
