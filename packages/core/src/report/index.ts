export { trialBalance, trialBalanceLine } from './trial-balance.js';
export { balanceSheet, incomeStatement } from './statements.js';
export type {
    BalanceSheet,
    IncomeStatement,
    StatementLine,
    StatementSection,
    TrialBalance,
    TrialBalanceLine,
} from './types.js';
