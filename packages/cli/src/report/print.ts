/**
 * Console rendering of the core report projections.
 */

import { LEDGER_DEFAULTS } from '@ducat-ledger/shared';
import {
    balanceSheet,
    incomeStatement,
    trialBalance,
    type Ledger,
    type Money,
    type StatementSection,
    type Transaction,
} from '@ducat-ledger/core';
import { heading, log, rule, success, warn, info } from '../utils/console.js';

const NAME_WIDTH = 30;
const COLUMN_WIDTH = 15;
const AMOUNT_WIDTH = 12;
const STATEMENT_WIDTH = NAME_WIDTH + 1 + AMOUNT_WIDTH;
const TRIAL_BALANCE_WIDTH = NAME_WIDTH + 2 + COLUMN_WIDTH * 2;

function columns(name: string, debit: string, credit: string): string {
    return `${name.padEnd(NAME_WIDTH)} ${debit.padStart(COLUMN_WIDTH)} ${credit.padStart(COLUMN_WIDTH)}`.trimEnd();
}

function amountLine(name: string, amount: Money): string {
    return `${name.padEnd(NAME_WIDTH)} ${amount.toString().padStart(AMOUNT_WIDTH)}`;
}

export function printTrialBalance(ledger: Ledger, currencyLabel: string = LEDGER_DEFAULTS.CURRENCY_LABEL): void {
    const report = trialBalance(ledger);

    heading(`Trial Balance: ${ledger.name}`, TRIAL_BALANCE_WIDTH);
    log(columns('Account', `Debit (${currencyLabel})`, `Credit (${currencyLabel})`));
    rule(TRIAL_BALANCE_WIDTH);

    for (const line of report.lines) {
        if (!line.debit && !line.credit) continue;
        log(columns(line.name, line.debit?.toString() ?? '', line.credit?.toString() ?? ''));
    }

    rule(TRIAL_BALANCE_WIDTH);
    log(columns('TOTAL', report.totalDebits.toString(), report.totalCredits.toString()));

    if (report.balanced) {
        success('Trial balance is balanced');
    } else {
        const difference = report.totalDebits.minus(report.totalCredits).abs();
        warn(`Trial balance is out of balance by ${difference.toString()} ${currencyLabel}`);
    }
}

function printSection(title: string, section: StatementSection): void {
    heading(title, STATEMENT_WIDTH);
    for (const line of section.lines) {
        log(amountLine(line.name, line.balance));
    }
    rule(STATEMENT_WIDTH);
    log(amountLine(`TOTAL ${title}`, section.total));
    log('');
}

export function printBalanceSheet(ledger: Ledger, currencyLabel: string = LEDGER_DEFAULTS.CURRENCY_LABEL): void {
    const report = balanceSheet(ledger);

    log(`Balance Sheet: ${ledger.name} (${currencyLabel})`);
    log('');
    printSection('ASSETS', report.assets);
    printSection('LIABILITIES', report.liabilities);
    printSection('EQUITY', report.equity);

    const claims = report.liabilities.total.plus(report.equity.total);
    log(amountLine('TOTAL LIABILITIES AND EQUITY', claims));

    if (report.balanced) {
        success('Assets equal liabilities plus equity');
    } else {
        // Expected on an open ledger: net income has not been closed to equity
        const difference = report.assets.total.minus(claims);
        info(`Assets minus liabilities and equity: ${difference.toString()} ${currencyLabel} (unclosed net income)`);
    }
}

export function printIncomeStatement(ledger: Ledger, currencyLabel: string = LEDGER_DEFAULTS.CURRENCY_LABEL): void {
    const report = incomeStatement(ledger);

    log(`Income Statement: ${ledger.name} (${currencyLabel})`);
    log('');
    printSection('REVENUE', report.revenue);
    printSection('EXPENSES', report.expenses);
    log(amountLine('NET INCOME', report.netIncome));
}

export function printTransaction(transaction: Transaction): void {
    log(transaction.toString());
}
