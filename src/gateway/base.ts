import { zeroHash } from "viem";
import { encodeStorageValue } from "../codec/rlp";
import { toAddress } from "../core/address";
import { ensure, fail } from "../core/errors";
import { storageSlotKey } from "../core/hash";
import { INBOX_SLOT, OUTBOX_SLOT } from "../core/messageBox";
import { MessageStatus } from "../core/types";
import { verifyAccount } from "../trie/proof";
import type { Address, Hex } from "../types";
import type { CallContext, EndpointEvent, EndpointState, ProveGatewayArgs } from "./types";

// Machinery shared by the Gateway and the CoGateway: remote storage roots,
// access checks and the storage view the chain commits.

/** Penalty charged on revocation, as a percentage of the bounty. */
export const REVOCATION_PENALTY = 150n;

export const penaltyFor = (bounty: bigint): bigint => (bounty * REVOCATION_PENALTY) / 100n;

const BYTES32_RE = /^0x[0-9a-fA-F]{64}$/;

/* ── argument checks ─────────────────────────────────────── */
export const ensureBytes32 = (value: Hex, label: string): void =>
  ensure(BYTES32_RE.test(value), "argument", `${label} must be 32 bytes.`);

/** Checks the terms of a new transfer; returns the canonical beneficiary. */
export const checkTransferTerms = (amount: bigint, beneficiary: string, hashLock: Hex): Address => {
  ensure(amount > 0n, "argument", "Amount must not be zero.");
  const canonical = toAddress(beneficiary, "Beneficiary");
  ensureBytes32(hashLock, "Hash lock");
  return canonical;
};

export const ensureProofBytes = (rlpParentNodes: Hex): void =>
  ensure(rlpParentNodes.length > 2, "argument", "RLP parent nodes must not be zero.");

/* ── access ──────────────────────────────────────────────── */
export const assertLinked = (s: EndpointState): void =>
  ensure(s.linked, "access", "Gateway is not linked.");

export const assertOrganization = (s: EndpointState, ctx: CallContext): void =>
  ensure(ctx.sender === s.organization, "access", "Only organization can call.");

/* ── remote storage roots ────────────────────────────────── */

/** Storage root of the counterpart endpoint proven at `blockHeight`. */
export const storageRootAt = (s: EndpointState, blockHeight: bigint): Hex => {
  const root = s.storageRoots.get(blockHeight);
  if (!root || root === zeroHash) return fail("anchor", "Storage root must not be zero.");
  return root;
};

/**
 * Resolves the counterpart endpoint's storage root from the anchored state
 * root. Proving the same height again must reproduce the stored root.
 */
export const proveGateway = <S extends EndpointState>(
  s: S,
  args: ProveGatewayArgs,
  ctx: CallContext,
): { state: S; event: EndpointEvent } => {
  ensure(args.rlpAccount.length > 2, "argument", "Length of RLP account must not be 0.");
  ensureProofBytes(args.rlpParentNodes);
  const stateRoot = ctx.anchor.getStateRoot(args.blockHeight);
  if (!stateRoot || stateRoot === zeroHash) return fail("anchor", "State root must not be zero.");

  ctx.gas.calldata(args.rlpAccount, args.rlpParentNodes);
  const storageRoot = verifyAccount(args.rlpAccount, args.rlpParentNodes, s.remote, stateRoot);

  const known = s.storageRoots.get(args.blockHeight);
  if (known !== undefined) {
    ensure(
      known === storageRoot,
      "proof",
      "Storage root mismatch when account is already proven.",
    );
  } else {
    ctx.gas.write();
  }
  const event: EndpointEvent = {
    type: "GatewayProven",
    gateway: s.remote,
    blockHeight: args.blockHeight,
    storageRoot,
    wasAlreadyProved: known !== undefined,
  };
  if (known !== undefined) return { state: s, event };
  return {
    state: { ...s, storageRoots: new Map(s.storageRoots).set(args.blockHeight, storageRoot) },
    event,
  };
};

/* ── committed storage ───────────────────────────────────── */

/**
 * Storage slots of the endpoint as the chain commits them: each non-zero
 * outbox and inbox status under its mapping slot key.
 */
export const endpointStorage = (s: EndpointState): Array<[Hex, Uint8Array]> => {
  const slots: Array<[Hex, Uint8Array]> = [];
  const add = (slot: bigint, entries: ReadonlyMap<Hex, MessageStatus>) => {
    for (const [messageHash, status] of entries) {
      if (status === MessageStatus.Undeclared) continue;
      slots.push([storageSlotKey(slot, messageHash), encodeStorageValue(BigInt(status))]);
    }
  };
  add(OUTBOX_SLOT, s.box.outbox);
  add(INBOX_SLOT, s.box.inbox);
  return slots;
};
