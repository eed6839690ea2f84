import { zeroAddress } from "viem";
import { ensure } from "../core/errors";
import type { Address } from "../types";

/** Minimal fungible-token bookkeeping: balances plus total supply. */
export interface Ledger {
  readonly address: Address;
  readonly symbol: string;
  readonly totalSupply: bigint;
  readonly balances: ReadonlyMap<Address, bigint>;
}

export const createLedger = (
  address: Address,
  symbol: string,
  allocations: Iterable<readonly [Address, bigint]> = [],
): Ledger => {
  const balances = new Map<Address, bigint>();
  let totalSupply = 0n;
  for (const [holder, amount] of allocations) {
    balances.set(holder, (balances.get(holder) ?? 0n) + amount);
    totalSupply += amount;
  }
  return { address, symbol, totalSupply, balances };
};

export const balanceOf = (ledger: Ledger, holder: Address): bigint =>
  ledger.balances.get(holder) ?? 0n;

const withBalance = (
  balances: Map<Address, bigint>,
  holder: Address,
  amount: bigint,
): Map<Address, bigint> => {
  if (amount === 0n) balances.delete(holder);
  else balances.set(holder, amount);
  return balances;
};

/** Moves `amount`; a zero amount is a no-op. */
export const transfer = (ledger: Ledger, from: Address, to: Address, amount: bigint): Ledger => {
  ensure(amount >= 0n, "argument", "Transfer amount must not be negative.");
  const fromBalance = balanceOf(ledger, from);
  ensure(fromBalance >= amount, "arithmetic", `Insufficient ${ledger.symbol} balance.`);
  if (amount === 0n || from === to) return ledger;
  const balances = new Map(ledger.balances);
  withBalance(balances, from, fromBalance - amount);
  withBalance(balances, to, balanceOf(ledger, to) + amount);
  return { ...ledger, balances };
};

export const mint = (ledger: Ledger, beneficiary: Address, amount: bigint): Ledger => {
  ensure(amount > 0n, "argument", "Amount should be greater than zero.");
  ensure(beneficiary !== zeroAddress, "argument", "Beneficiary address should not be zero.");
  const balances = withBalance(
    new Map(ledger.balances),
    beneficiary,
    balanceOf(ledger, beneficiary) + amount,
  );
  return { ...ledger, balances, totalSupply: ledger.totalSupply + amount };
};

export const burn = (ledger: Ledger, holder: Address, amount: bigint): Ledger => {
  ensure(amount > 0n, "argument", "Amount should be greater than zero.");
  const balance = balanceOf(ledger, holder);
  ensure(balance >= amount, "arithmetic", `Insufficient ${ledger.symbol} balance to burn.`);
  ensure(ledger.totalSupply >= amount, "arithmetic", "Burn exceeds total supply.");
  const balances = withBalance(new Map(ledger.balances), holder, balance - amount);
  return { ...ledger, balances, totalSupply: ledger.totalSupply - amount };
};
