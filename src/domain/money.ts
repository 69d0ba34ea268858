/**
 * Money Value Object
 *
 * Amounts are integer cents so that line totals add up exactly. The wire
 * format is a fixed decimal string with two fractional digits.
 */
export class Money {
  private constructor(private readonly cents: number) {
    Object.freeze(this);
  }

  static fromCents(cents: number): Money {
    if (!Number.isSafeInteger(cents)) {
      throw new InvalidMoneyError(`Amount must be a whole number of cents, got ${cents}`);
    }
    if (cents < 0) {
      throw new InvalidMoneyError('Amount cannot be negative');
    }
    return new Money(cents);
  }

  /**
   * Parse a decimal string such as "19.99" or "5".
   */
  static parse(value: string): Money {
    const match = /^(\d+)(?:\.(\d{1,2}))?$/.exec(value.trim());
    if (!match) {
      throw new InvalidMoneyError(`Invalid amount: ${value}`);
    }
    const whole = Number(match[1]);
    const fraction = Number((match[2] ?? '').padEnd(2, '0'));
    return Money.fromCents(whole * 100 + fraction);
  }

  static zero(): Money {
    return new Money(0);
  }

  getCents(): number {
    return this.cents;
  }

  add(other: Money): Money {
    return Money.fromCents(this.cents + other.cents);
  }

  multiply(quantity: number): Money {
    if (!Number.isInteger(quantity) || quantity < 0) {
      throw new InvalidMoneyError(`Invalid quantity: ${quantity}`);
    }
    return Money.fromCents(this.cents * quantity);
  }

  equals(other: Money): boolean {
    return this.cents === other.cents;
  }

  /** "59.97" */
  toString(): string {
    const whole = Math.floor(this.cents / 100);
    const fraction = String(this.cents % 100).padStart(2, '0');
    return `${whole}.${fraction}`;
  }

  toJSON(): string {
    return this.toString();
  }
}

export class InvalidMoneyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidMoneyError';
  }
}
