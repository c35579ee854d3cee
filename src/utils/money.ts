/**
 * Money helpers. Amounts travel through the code as integer cents so sums and
 * products stay exact; PostgreSQL stores them as DECIMAL(10, 2) and hands them
 * back as strings.
 */

const DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d{1,2}))?$/;

export type Cents = number;

/**
 * Parse a decimal amount ("5", "5.5", "5.00") into cents without touching floating point
 */
export const toCents = (amount: string | number): Cents => {
  const text = typeof amount === 'number' ? amount.toFixed(2) : amount.trim();
  const match = DECIMAL_PATTERN.exec(text);

  if (!match) {
    throw new RangeError(`Invalid money amount: ${text}`);
  }

  const [, sign, whole, fraction = ''] = match;
  const cents = parseInt(whole, 10) * 100 + parseInt(fraction.padEnd(2, '0'), 10);

  if (!Number.isSafeInteger(cents)) {
    throw new RangeError(`Money amount out of range: ${text}`);
  }

  return sign ? -cents : cents;
};

export const formatCents = (cents: Cents): string => {
  if (!Number.isSafeInteger(cents)) {
    throw new RangeError(`Invalid cents value: ${cents}`);
  }

  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(cents);
  const whole = Math.floor(abs / 100);
  const fraction = String(abs % 100).padStart(2, '0');

  return `${sign}${whole}.${fraction}`;
};

export const lineTotalCents = (price: string, quantity: number): Cents => toCents(price) * quantity;

/**
 * Sum of price * quantity over order lines, as a DECIMAL string
 */
export const sumLineTotals = (lines: ReadonlyArray<{ price: string; quantity: number }>): string =>
  formatCents(lines.reduce((total, line) => total + lineTotalCents(line.price, line.quantity), 0));
