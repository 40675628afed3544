import type { AccountType } from '@ducat-ledger/shared';
import { Money } from '../money/money.js';
import type { Ledger } from '../ledger/ledger.js';
import type { BalanceSheet, IncomeStatement, StatementSection } from './types.js';

// Zero-balance accounts are left out of statement sections
function section(ledger: Ledger, type: AccountType): StatementSection {
    const lines = ledger.accounts
        .filter((account) => account.type === type && !account.balance.isZero())
        .map((account) => ({ name: account.name, balance: account.balance }));

    return {
        lines,
        total: Money.sum(lines.map((line) => line.balance)),
    };
}

export function balanceSheet(ledger: Ledger): BalanceSheet {
    const assets = section(ledger, 'ASSET');
    const liabilities = section(ledger, 'LIABILITY');
    const equity = section(ledger, 'EQUITY');

    return {
        assets,
        liabilities,
        equity,
        balanced: assets.total.equals(liabilities.total.plus(equity.total)),
    };
}

export function incomeStatement(ledger: Ledger): IncomeStatement {
    const revenue = section(ledger, 'REVENUE');
    const expenses = section(ledger, 'EXPENSE');

    return {
        revenue,
        expenses,
        netIncome: revenue.total.minus(expenses.total),
    };
}
