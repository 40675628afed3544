import type { Workbook } from 'exceljs';
import { Money, trialBalance, type Ledger } from '@ducat-ledger/core';
import { createWorkbook, formatHeaderRow, formatFooterRow, autoFitColumns, formatCurrencyColumn } from './utils.js';

function cellAmount(amount: Money | null): number | null {
    return amount ? amount.toNumber() : null;
}

/**
 * Ledger workbook: a Journal sheet with one line per debit/credit entry,
 * and a Trial Balance sheet. Totals are summed exactly before conversion
 * to spreadsheet numbers.
 */
export async function generateLedgerWorkbook(ledger: Ledger): Promise<Workbook> {
    const workbook = createWorkbook(ledger.name);

    const journal = workbook.addWorksheet('Journal');
    journal.columns = [
        { header: 'id', key: 'id' },
        { header: 'date', key: 'date' },
        { header: 'description', key: 'description' },
        { header: 'account', key: 'account' },
        { header: 'account_type', key: 'account_type' },
        { header: 'debit', key: 'debit' },
        { header: 'credit', key: 'credit' },
    ];

    let totalDebits = Money.ZERO;
    let totalCredits = Money.ZERO;

    ledger.transactions.forEach((transaction, index) => {
        const base = { id: index + 1, date: transaction.date, description: transaction.description };

        for (const entry of transaction.debits) {
            totalDebits = totalDebits.plus(entry.amount);
            journal.addRow({
                ...base,
                account: entry.account.name,
                account_type: entry.account.type,
                debit: entry.amount.toNumber(),
                credit: null,
            });
        }
        for (const entry of transaction.credits) {
            totalCredits = totalCredits.plus(entry.amount);
            journal.addRow({
                ...base,
                account: entry.account.name,
                account_type: entry.account.type,
                debit: null,
                credit: entry.amount.toNumber(),
            });
        }
    });

    formatFooterRow(journal.addRow({
        account: 'TOTALS',
        debit: totalDebits.toNumber(),
        credit: totalCredits.toNumber(),
    }));

    formatHeaderRow(journal);
    formatCurrencyColumn(journal, 'debit');
    formatCurrencyColumn(journal, 'credit');
    autoFitColumns(journal);

    // Keep id and date in view when scrolling
    journal.views = [
        { state: 'frozen', xSplit: 2, ySplit: 1 }
    ];

    const report = trialBalance(ledger);
    const trialSheet = workbook.addWorksheet('Trial Balance');
    trialSheet.columns = [
        { header: 'account', key: 'account' },
        { header: 'account_type', key: 'account_type' },
        { header: 'debit', key: 'debit' },
        { header: 'credit', key: 'credit' },
    ];

    for (const line of report.lines) {
        if (!line.debit && !line.credit) continue;
        trialSheet.addRow({
            account: line.name,
            account_type: line.type,
            debit: cellAmount(line.debit),
            credit: cellAmount(line.credit),
        });
    }

    formatFooterRow(trialSheet.addRow({
        account: 'TOTALS',
        debit: report.totalDebits.toNumber(),
        credit: report.totalCredits.toNumber(),
    }));

    formatHeaderRow(trialSheet);
    formatCurrencyColumn(trialSheet, 'debit');
    formatCurrencyColumn(trialSheet, 'credit');
    autoFitColumns(trialSheet);

    return workbook;
}
