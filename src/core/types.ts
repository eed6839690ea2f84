import type { Address, Hex } from "../types";

/* ── message lifecycle ───────────────────────────────────── */
export enum MessageStatus {
  Undeclared = 0,
  Declared = 1,
  Progressed = 2,
  DeclaredRevocation = 3,
  Revoked = 4,
}

export type BoxSide = "outbox" | "inbox";

/* ── cross-chain message ─────────────────────────────────── */
export interface Message {
  readonly intentHash: Hex;
  readonly nonce: bigint;
  readonly gasPrice: bigint;
  readonly gasLimit: bigint;
  readonly sender: Address;
  readonly hashLock: Hex;
  /** Gas spent by the confirming call; zero until confirmed. */
  readonly gasConsumed: bigint;
}

/** Outbox holds self-originated messages, inbox counterpart-confirmed ones. */
export interface MessageBox {
  readonly outbox: ReadonlyMap<Hex, MessageStatus>;
  readonly inbox: ReadonlyMap<Hex, MessageStatus>;
}

/* ── registry records (keyed by message hash) ────────────── */
export interface Registered {
  readonly message: Message;
}

export interface MessageRegistry<R extends Registered> {
  readonly records: ReadonlyMap<Hex, R>;
  /** account → hash of its latest message */
  readonly active: ReadonlyMap<Address, Hex>;
}

export interface Stake extends Registered {
  readonly amount: bigint;
  readonly beneficiary: Address;
  readonly bounty: bigint;
}

export interface Unstake extends Registered {
  readonly amount: bigint;
  readonly beneficiary: Address;
}

export interface Mint extends Registered {
  readonly amount: bigint;
  readonly beneficiary: Address;
}

export interface Redeem extends Registered {
  readonly amount: bigint;
  readonly beneficiary: Address;
  readonly bounty: bigint;
  /** caller that progressed the redemption */
  readonly facilitator?: Address;
}

export interface GatewayLink {
  readonly messageHash: Hex;
  readonly message: Message;
}
