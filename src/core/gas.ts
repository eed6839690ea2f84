import { size } from "viem";
import type { Hex } from "../types";
import { ensure } from "./errors";
import type { Message } from "./types";

export interface GasSchedule {
  /** charged once per call */
  readonly base: bigint;
  readonly storageWrite: bigint;
  readonly calldataByte: bigint;
}

export const DEFAULT_GAS_SCHEDULE: GasSchedule = {
  base: 21_000n,
  storageWrite: 20_000n,
  calldataByte: 16n,
};

/** Deterministic per-call gas counter. */
export class GasMeter {
  private consumed: bigint;

  constructor(private readonly schedule: GasSchedule = DEFAULT_GAS_SCHEDULE) {
    this.consumed = schedule.base;
  }

  used(): bigint {
    return this.consumed;
  }

  write(slots = 1): void {
    this.consumed += this.schedule.storageWrite * BigInt(slots);
  }

  calldata(...payloads: Hex[]): void {
    for (const p of payloads) this.consumed += this.schedule.calldataByte * BigInt(size(p));
  }
}

export interface Reward {
  fee: bigint;
  totalGasConsumed: bigint;
}

/**
 * fee = min(gas spent at confirmation + gas spent now, gasLimit) * gasPrice.
 * Fails when the fee would exceed the transferred amount.
 */
export const computeReward = (message: Message, meter: GasMeter, amount: bigint): Reward => {
  const totalGasConsumed = message.gasConsumed + meter.used();
  const billable = totalGasConsumed > message.gasLimit ? message.gasLimit : totalGasConsumed;
  const fee = billable * message.gasPrice;
  ensure(fee <= amount, "arithmetic", "Reward exceeds the transferred amount.");
  return { fee, totalGasConsumed };
};

/** Upper bound on the reward a message can ever pay. */
export const maxReward = (gasPrice: bigint, gasLimit: bigint): bigint => gasPrice * gasLimit;
