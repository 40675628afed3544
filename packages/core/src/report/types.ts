import type { AccountType } from '@ducat-ledger/shared';
import type { Money } from '../money/money.js';

/**
 * One account on the trial balance. Exactly one of debit/credit is set
 * for a non-zero balance; both are null when the balance is zero.
 */
export interface TrialBalanceLine {
    name: string;
    type: AccountType;
    debit: Money | null;
    credit: Money | null;
}

export interface TrialBalance {
    lines: TrialBalanceLine[];
    totalDebits: Money;
    totalCredits: Money;
    balanced: boolean;
}

export interface StatementLine {
    name: string;
    balance: Money;
}

export interface StatementSection {
    lines: StatementLine[];
    total: Money;
}

export interface BalanceSheet {
    assets: StatementSection;
    liabilities: StatementSection;
    equity: StatementSection;
    /** Assets == Liabilities + Equity. Open ledgers with income activity may not be. */
    balanced: boolean;
}

export interface IncomeStatement {
    revenue: StatementSection;
    expenses: StatementSection;
    netIncome: Money;
}
