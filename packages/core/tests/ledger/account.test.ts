import { describe, it, expect } from 'vitest';
import { Account, normalSide, debitSign } from '../../src/ledger/account.js';
import { Money } from '../../src/money/money.js';

describe('normalSide', () => {
    it('puts assets and expenses on the debit side', () => {
        expect(normalSide('ASSET')).toBe('debit');
        expect(normalSide('EXPENSE')).toBe('debit');
    });

    it('puts liabilities, equity and revenue on the credit side', () => {
        expect(normalSide('LIABILITY')).toBe('credit');
        expect(normalSide('EQUITY')).toBe('credit');
        expect(normalSide('REVENUE')).toBe('credit');
    });

    it('maps sides to debit signs', () => {
        expect(debitSign('ASSET')).toBe(1);
        expect(debitSign('REVENUE')).toBe(-1);
    });
});

describe('Account', () => {
    it('starts at zero', () => {
        expect(new Account('Cash', 'ASSET').balance.toString()).toBe('0.00');
    });

    it('grows an asset on debit and shrinks it on credit', () => {
        const cash = new Account('Cash', 'ASSET');
        cash.debit(Money.of('100.00'));
        cash.credit(Money.of('30.00'));
        expect(cash.balance.toString()).toBe('70.00');
        expect(cash.normalizedBalance.toString()).toBe('70.00');
    });

    it('grows a liability on credit and shrinks it on debit', () => {
        const loans = new Account('Loans', 'LIABILITY');
        loans.credit(Money.of('100.00'));
        loans.debit(Money.of('30.00'));
        expect(loans.balance.toString()).toBe('70.00');
        expect(loans.normalizedBalance.toString()).toBe('-70.00');
    });

    it('goes negative when credited past zero', () => {
        const cash = new Account('Cash', 'ASSET');
        cash.credit(Money.of('5.00'));
        expect(cash.balance.toString()).toBe('-5.00');
    });

    it('prints name, type and balance', () => {
        const wages = new Account('Wages', 'EXPENSE');
        wages.debit(Money.of('800'));
        expect(wages.toString()).toBe('Wages (EXPENSE): 800.00');
    });
});
