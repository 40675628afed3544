/**
 * Exact fixed-point money at MONEY_SCALE fractional digits (cents).
 *
 * Backed by decimal.js, never native floating point. Every value is
 * rounded half-up to cents once, on construction; all arithmetic after
 * that is exact, and equality is exact.
 */

import { Decimal } from 'decimal.js';
import { MONEY_SCALE } from '@ducat-ledger/shared';
import { LedgerError } from '../errors.js';

export type MoneyInput = Money | Decimal | string | number;

const DECIMAL_PATTERN = /^[-+]?\d+(\.\d+)?$/;

// decimal.js rounds to 20 significant digits by default; money never rounds after construction
const ExactDecimal = Decimal.clone({ precision: 1e9 });
const CENTS_PER_UNIT = new ExactDecimal(10).pow(MONEY_SCALE);

export class Money {
    static readonly ZERO = new Money(new ExactDecimal(0));

    private readonly value: Decimal;

    private constructor(value: Decimal) {
        // Collapse -0 so that "-0.00" is never printed
        this.value = value.isZero() ? new ExactDecimal(0) : new ExactDecimal(value);
    }

    /**
     * Build from a decimal string ("1000.00"), number, Decimal or Money.
     * Strings must be plain decimals: no exponent, no separators.
     */
    static of(input: MoneyInput): Money {
        if (input instanceof Money) {
            return input;
        }

        let decimal: Decimal;
        if (input instanceof Decimal) {
            decimal = new ExactDecimal(input);
        } else if (typeof input === 'number') {
            if (!Number.isFinite(input)) {
                throw new LedgerError('INVALID_AMOUNT', `Invalid amount: ${input}`);
            }
            decimal = new ExactDecimal(input);
        } else {
            const trimmed = input.trim();
            if (!DECIMAL_PATTERN.test(trimmed)) {
                throw new LedgerError('INVALID_AMOUNT', `Invalid amount: "${input}"`);
            }
            decimal = new ExactDecimal(trimmed);
        }

        if (!decimal.isFinite()) {
            throw new LedgerError('INVALID_AMOUNT', `Invalid amount: ${decimal.toString()}`);
        }

        return new Money(decimal.toDecimalPlaces(MONEY_SCALE, Decimal.ROUND_HALF_UP));
    }

    /**
     * Build from an integer count of cents.
     */
    static fromCents(cents: bigint | number): Money {
        if (typeof cents === 'number' && !Number.isSafeInteger(cents)) {
            throw new LedgerError('INVALID_AMOUNT', `Cents must be an integer: ${cents}`);
        }
        return new Money(new ExactDecimal(cents.toString()).dividedBy(CENTS_PER_UNIT));
    }

    static sum(amounts: Iterable<Money>): Money {
        let total = Money.ZERO;
        for (const amount of amounts) {
            total = total.plus(amount);
        }
        return total;
    }

    plus(other: Money): Money {
        return new Money(this.value.plus(other.value));
    }

    minus(other: Money): Money {
        return new Money(this.value.minus(other.value));
    }

    negated(): Money {
        return new Money(this.value.negated());
    }

    abs(): Money {
        return new Money(this.value.abs());
    }

    /**
     * Split into `parts` cent-exact shares that sum back to this amount.
     * Shares differ by at most one cent; the leading shares carry the
     * remainder ("100.00" / 3 -> 33.34, 33.33, 33.33).
     */
    split(parts: number): Money[] {
        if (!Number.isInteger(parts) || parts < 1) {
            throw new LedgerError('INVALID_AMOUNT', `Cannot split an amount into ${parts} parts`);
        }

        const cents = this.toCents();
        const count = BigInt(parts);
        const base = cents / count;
        const remainder = cents - base * count;
        const step = remainder < 0n ? -1n : 1n;
        let left = remainder < 0n ? -remainder : remainder;

        const shares: Money[] = [];
        for (let i = 0; i < parts; i++) {
            if (left > 0n) {
                shares.push(Money.fromCents(base + step));
                left -= 1n;
            } else {
                shares.push(Money.fromCents(base));
            }
        }
        return shares;
    }

    equals(other: Money): boolean {
        return this.value.equals(other.value);
    }

    /**
     * -1, 0 or 1.
     */
    compare(other: Money): number {
        return this.value.comparedTo(other.value);
    }

    isZero(): boolean {
        return this.value.isZero();
    }

    isNegative(): boolean {
        return this.value.isNegative();
    }

    isPositive(): boolean {
        return this.value.greaterThan(0);
    }

    toCents(): bigint {
        return BigInt(this.value.times(CENTS_PER_UNIT).toFixed(0));
    }

    toDecimal(): Decimal {
        return this.value;
    }

    /**
     * Lossy; only for presentation layers that need a JS number (Excel cells).
     */
    toNumber(): number {
        return this.value.toNumber();
    }

    /**
     * Always MONEY_SCALE decimals: "1000.00", "-0.50".
     */
    toString(): string {
        return this.value.toFixed(MONEY_SCALE);
    }

    toJSON(): string {
        return this.toString();
    }
}
