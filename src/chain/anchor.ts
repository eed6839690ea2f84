import { zeroHash } from "viem";
import { ensure } from "../core/errors";
import type { Hex } from "../types";

/** What the message bus needs from the consensus layer. */
export interface StateRootProvider {
  getStateRoot(blockHeight: bigint): Hex | undefined;
}

/**
 * Keeps finalized state roots of the counterpart chain. Heights only grow,
 * and only the newest `maxStateRoots` entries stay available.
 */
export class Anchor implements StateRootProvider {
  private readonly roots = new Map<bigint, Hex>();
  private readonly order: bigint[] = [];
  private latest: bigint | undefined;

  constructor(private readonly maxStateRoots = 100) {
    ensure(maxStateRoots > 0, "argument", "Max state roots must be positive.");
  }

  get latestStateRootBlockHeight(): bigint | undefined {
    return this.latest;
  }

  getStateRoot(blockHeight: bigint): Hex | undefined {
    return this.roots.get(blockHeight);
  }

  anchorStateRoot(blockHeight: bigint, stateRoot: Hex): void {
    ensure(stateRoot !== zeroHash, "argument", "State root must not be zero.");
    ensure(
      this.latest === undefined || blockHeight > this.latest,
      "anchor",
      "Given block height is lower or equal to highest anchored state root block height.",
    );
    this.roots.set(blockHeight, stateRoot);
    this.order.push(blockHeight);
    this.latest = blockHeight;
    while (this.order.length > this.maxStateRoots) {
      const evicted = this.order.shift();
      if (evicted !== undefined) this.roots.delete(evicted);
    }
  }
}
