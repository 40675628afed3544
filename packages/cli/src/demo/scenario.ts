import { Ledger, type Account } from '@ducat-ledger/core';
import type { AccountType } from '@ducat-ledger/shared';

const CHART: ReadonlyArray<[string, AccountType]> = [
    ['Cash', 'ASSET'],
    ['Accounts Receivable', 'ASSET'],
    ['Inventory', 'ASSET'],
    ['Land', 'ASSET'],
    ['Accounts Payable', 'LIABILITY'],
    ['Loans', 'LIABILITY'],
    ["Owner's Capital", 'EQUITY'],
    ['Retained Earnings', 'EQUITY'],
    ['Revenue', 'REVENUE'],
    ['Interest Income', 'REVENUE'],
    ['Expenses', 'EXPENSE'],
    ['Wages', 'EXPENSE'],
];

function account(ledger: Ledger, name: string): Account {
    const found = ledger.getAccount(name);
    if (!found) {
        throw new Error(`Demo account missing: ${name}`);
    }
    return found;
}

/**
 * First year of a Florentine banking house, 1397: founding capital,
 * a merchant loan repaid in part with interest, a land purchase and wages.
 */
export function buildDemoLedger(): Ledger {
    const ledger = new Ledger('Florentine Bank');
    for (const [name, type] of CHART) {
        ledger.createAccount(name, type);
    }

    const cash = account(ledger, 'Cash');
    const receivable = account(ledger, 'Accounts Receivable');
    const land = account(ledger, 'Land');
    const capital = account(ledger, "Owner's Capital");
    const interest = account(ledger, 'Interest Income');
    const wages = account(ledger, 'Wages');

    ledger.recordTransaction('1397-01-01', 'Initial investment from the founding partner',
        { account: cash, amount: '10000.00' },
        { account: capital, amount: '10000.00' });

    ledger.recordTransaction('1397-02-15', 'Loan to wool merchant',
        { account: receivable, amount: '2000.00' },
        { account: cash, amount: '-2000.00' });

    ledger.recordTransaction('1397-08-10', 'Partial loan repayment from wool merchant with interest',
        { account: cash, amount: '1200.00' },
        { account: receivable, amount: '-1000.00' },
        { account: interest, amount: '200.00' });

    ledger.recordTransaction('1397-09-05', 'Purchase of land for a new banking house',
        { account: land, amount: '3000.00' },
        { account: cash, amount: '-3000.00' });

    ledger.recordTransaction('1397-12-01', 'Quarterly wages for bank employees',
        { account: wages, amount: '800.00' },
        { account: cash, amount: '-800.00' });

    return ledger;
}
