import { Money, Quantity } from './types';

const CENTS = 100;

/**
 * Round to two fraction digits, half away from zero
 */
export function roundMoney(amount: number): Money {
  // toPrecision drops the binary noise in values such as 1.005 * 100
  const cents = Math.round(Number((Math.abs(amount) * CENTS).toPrecision(15)));
  return (Math.sign(amount) * cents) / CENTS || 0;
}

export function lineSubtotal(quantity: Quantity, unitPrice: Money): Money {
  return roundMoney(quantity * unitPrice);
}

export function sumMoney(amounts: readonly Money[]): Money {
  return roundMoney(amounts.reduce((total, amount) => total + amount, 0));
}
