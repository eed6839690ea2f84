import { zeroHash } from "viem";
import { toAddress } from "../core/address";
import { transfer, type Ledger } from "../chain/ledger";
import { ensure } from "../core/errors";
import { computeReward, maxReward } from "../core/gas";
import { hashRedeemIntent, hashStakeIntent, messageDigest } from "../core/hash";
import {
  confirm,
  confirmRevocation,
  declare,
  declareRevocation,
  emptyMessageBox,
  progress,
  progressRevocationWithProof,
  progressWithProof,
  statusOf,
} from "../core/messageBox";
import { emptyRegistry, getRecord, initiateNewProcess } from "../core/registry";
import { MessageStatus, type Message, type Stake, type Unstake } from "../core/types";
import type { Address, Hex, Transition } from "../types";
import {
  assertLinked,
  assertOrganization,
  endpointStorage,
  checkTransferTerms,
  ensureBytes32,
  ensureProofBytes,
  penaltyFor,
  proveGateway,
  storageRootAt,
} from "./base";
import {
  initiateGatewayLink,
  progressGatewayLink,
  progressGatewayLinkWithProof,
} from "./link";
import type {
  CallContext,
  ConfirmIntentArgs,
  GatewayState,
  OriginCommand,
  OriginEvent,
  OriginState,
  ProofProgressArgs,
  RevocationProofArgs,
  SecretArgs,
  TokenMetadata,
  TransferIntentArgs,
} from "./types";

type Result = Transition<OriginState, OriginEvent>;

/* ── construction ────────────────────────────────────────── */
export interface GatewayParams {
  address: Address;
  coGateway: Address;
  organization: Address;
  burner: Address;
  stakeVault: Address;
  bounty: bigint;
  metadata: TokenMetadata;
}

export const createGateway = (
  p: GatewayParams,
  valueToken: Ledger,
  baseToken: Ledger,
): OriginState => ({
  gateway: {
    role: "origin",
    address: p.address,
    remote: p.coGateway,
    organization: p.organization,
    burner: p.burner,
    bounty: p.bounty,
    valueToken: valueToken.address,
    baseToken: baseToken.address,
    stakeVault: p.stakeVault,
    metadata: p.metadata,
    linked: false,
    activated: false,
    box: emptyMessageBox(),
    storageRoots: new Map(),
    stakes: emptyRegistry(),
    unstakes: emptyRegistry(),
  },
  valueToken,
  baseToken,
});

/* ── helpers ─────────────────────────────────────────────── */
const withGateway = (s: OriginState, gateway: GatewayState): OriginState => ({ ...s, gateway });

/* ── stake (outbox) ──────────────────────────────────────── */
const stake = (s: OriginState, a: TransferIntentArgs, ctx: CallContext): Result => {
  const g = s.gateway;
  assertLinked(g);
  ensure(g.activated, "access", "Gateway is not activated.");
  const beneficiary = checkTransferTerms(a.amount, a.beneficiary, a.hashLock);
  ensure(
    a.amount > maxReward(a.gasPrice, a.gasLimit),
    "arithmetic",
    "Maximum possible reward must be less than the stake amount.",
  );

  const staker = ctx.sender;
  const message: Message = {
    intentHash: hashStakeIntent(a.amount, beneficiary, g.address),
    nonce: a.nonce,
    gasPrice: a.gasPrice,
    gasLimit: a.gasLimit,
    sender: staker,
    hashLock: a.hashLock,
    gasConsumed: 0n,
  };
  const messageHash = messageDigest(message);
  const stakes = initiateNewProcess(
    g.stakes,
    staker,
    a.nonce,
    messageHash,
    { amount: a.amount, beneficiary, bounty: g.bounty, message },
    (h) => statusOf(g.box, "outbox", h),
  );
  const box = declare(g.box, messageHash);
  ctx.gas.write(3);

  return {
    state: {
      gateway: { ...g, stakes, box },
      valueToken: transfer(s.valueToken, staker, g.address, a.amount),
      baseToken: transfer(s.baseToken, staker, g.address, g.bounty),
    },
    event: {
      type: "StakeIntentDeclared",
      messageHash,
      staker,
      stakerNonce: a.nonce,
      beneficiary,
      amount: a.amount,
    },
  };
};

// escrowed amount goes to the vault, the bounty to whoever completed the stake
const settleStake = (
  s: OriginState,
  gateway: GatewayState,
  record: Stake,
  messageHash: Hex,
  ctx: CallContext,
  unlockSecret?: Hex,
): Result => ({
  state: {
    gateway,
    valueToken: transfer(s.valueToken, gateway.address, gateway.stakeVault, record.amount),
    baseToken: transfer(s.baseToken, gateway.address, ctx.sender, record.bounty),
  },
  event: {
    type: "StakeProgressed",
    messageHash,
    staker: record.message.sender,
    stakerNonce: record.message.nonce,
    amount: record.amount,
    proofProgress: unlockSecret === undefined,
    unlockSecret: unlockSecret ?? zeroHash,
  },
});

const progressStake = (s: OriginState, a: SecretArgs, ctx: CallContext): Result => {
  const g = s.gateway;
  const record = getRecord(g.stakes, a.messageHash);
  const box = progress(g.box, "outbox", a.messageHash, record.message, a.unlockSecret);
  ctx.gas.write();
  return settleStake(s, { ...g, box }, record, a.messageHash, ctx, a.unlockSecret);
};

const progressStakeWithProof = (
  s: OriginState,
  a: ProofProgressArgs,
  ctx: CallContext,
): Result => {
  const g = s.gateway;
  const record = getRecord(g.stakes, a.messageHash);
  const box = progressWithProof(
    g.box,
    "outbox",
    a.messageHash,
    a.rlpParentNodes,
    storageRootAt(g, a.blockHeight),
    a.messageStatus,
  );
  ctx.gas.calldata(a.rlpParentNodes);
  ctx.gas.write();
  return settleStake(s, { ...g, box }, record, a.messageHash, ctx);
};

/* ── stake revocation ────────────────────────────────────── */
const revertStake = (s: OriginState, messageHash: Hex, ctx: CallContext): Result => {
  const g = s.gateway;
  const record = getRecord(g.stakes, messageHash);
  ensure(ctx.sender === record.message.sender, "access", "Only staker can revert stake.");
  const box = declareRevocation(g.box, messageHash);
  const penalty = penaltyFor(record.bounty);
  ctx.gas.write();

  return {
    state: {
      ...s,
      gateway: { ...g, box },
      baseToken: transfer(s.baseToken, ctx.sender, g.address, penalty),
    },
    event: {
      type: "RevertStakeIntentDeclared",
      messageHash,
      staker: ctx.sender,
      stakerNonce: record.message.nonce,
      amount: record.amount,
    },
  };
};

const progressRevertStake = (
  s: OriginState,
  a: RevocationProofArgs,
  ctx: CallContext,
): Result => {
  const g = s.gateway;
  const record = getRecord(g.stakes, a.messageHash);
  const box = progressRevocationWithProof(
    g.box,
    a.messageHash,
    a.rlpParentNodes,
    storageRootAt(g, a.blockHeight),
    MessageStatus.Revoked,
  );
  ctx.gas.calldata(a.rlpParentNodes);
  ctx.gas.write();

  const staker = record.message.sender;
  return {
    state: {
      gateway: { ...g, box },
      valueToken: transfer(s.valueToken, g.address, staker, record.amount),
      baseToken: transfer(
        s.baseToken,
        g.address,
        g.burner,
        record.bounty + penaltyFor(record.bounty),
      ),
    },
    event: {
      type: "StakeReverted",
      messageHash: a.messageHash,
      staker,
      stakerNonce: record.message.nonce,
      amount: record.amount,
    },
  };
};

/* ── redeem intents (inbox) ──────────────────────────────── */
const confirmRedeemIntent = (s: OriginState, a: ConfirmIntentArgs, ctx: CallContext): Result => {
  const g = s.gateway;
  assertLinked(g);
  const beneficiary = checkTransferTerms(a.amount, a.beneficiary, a.hashLock);
  const sender = toAddress(a.sender, "Redeemer");
  ensureProofBytes(a.rlpParentNodes);

  const terms: Message = {
    intentHash: hashRedeemIntent(a.amount, beneficiary, g.remote),
    nonce: a.nonce,
    gasPrice: a.gasPrice,
    gasLimit: a.gasLimit,
    sender,
    hashLock: a.hashLock,
    gasConsumed: 0n,
  };
  const messageHash = messageDigest(terms);
  const box = confirm(g.box, messageHash, a.rlpParentNodes, storageRootAt(g, a.blockHeight));
  ctx.gas.calldata(a.rlpParentNodes);
  ctx.gas.write(3);

  const message: Message = { ...terms, gasConsumed: ctx.gas.used() };
  const unstakes = initiateNewProcess(
    g.unstakes,
    sender,
    a.nonce,
    messageHash,
    { amount: a.amount, beneficiary, message },
    (h) => statusOf(box, "inbox", h),
  );

  return {
    state: withGateway(s, { ...g, box, unstakes }),
    event: {
      type: "RedeemIntentConfirmed",
      messageHash,
      redeemer: sender,
      redeemerNonce: a.nonce,
      beneficiary,
      amount: a.amount,
      blockHeight: a.blockHeight,
      hashLock: a.hashLock,
    },
  };
};

// the vault releases amount - fee to the beneficiary and the fee to the caller
const settleUnstake = (
  s: OriginState,
  gateway: GatewayState,
  record: Unstake,
  messageHash: Hex,
  ctx: CallContext,
  unlockSecret?: Hex,
): Result => {
  const { fee } = computeReward(record.message, ctx.gas, record.amount);
  const unstakeAmount = record.amount - fee;
  const released = transfer(s.valueToken, gateway.stakeVault, record.beneficiary, unstakeAmount);
  return {
    state: {
      ...s,
      gateway,
      valueToken: transfer(released, gateway.stakeVault, ctx.sender, fee),
    },
    event: {
      type: "UnstakeProgressed",
      messageHash,
      redeemer: record.message.sender,
      beneficiary: record.beneficiary,
      redeemAmount: record.amount,
      unstakeAmount,
      rewardAmount: fee,
      proofProgress: unlockSecret === undefined,
      unlockSecret: unlockSecret ?? zeroHash,
    },
  };
};

const progressUnstake = (s: OriginState, a: SecretArgs, ctx: CallContext): Result => {
  const g = s.gateway;
  const record = getRecord(g.unstakes, a.messageHash);
  const box = progress(g.box, "inbox", a.messageHash, record.message, a.unlockSecret);
  ctx.gas.write();
  return settleUnstake(s, { ...g, box }, record, a.messageHash, ctx, a.unlockSecret);
};

const progressUnstakeWithProof = (
  s: OriginState,
  a: ProofProgressArgs,
  ctx: CallContext,
): Result => {
  const g = s.gateway;
  const record = getRecord(g.unstakes, a.messageHash);
  const box = progressWithProof(
    g.box,
    "inbox",
    a.messageHash,
    a.rlpParentNodes,
    storageRootAt(g, a.blockHeight),
    a.messageStatus,
  );
  ctx.gas.calldata(a.rlpParentNodes);
  ctx.gas.write();
  return settleUnstake(s, { ...g, box }, record, a.messageHash, ctx);
};

const confirmRevertRedeemIntent = (
  s: OriginState,
  a: RevocationProofArgs,
  ctx: CallContext,
): Result => {
  const g = s.gateway;
  const record = getRecord(g.unstakes, a.messageHash);
  const box = confirmRevocation(
    g.box,
    a.messageHash,
    a.rlpParentNodes,
    storageRootAt(g, a.blockHeight),
  );
  ctx.gas.calldata(a.rlpParentNodes);
  ctx.gas.write();
  return {
    state: withGateway(s, { ...g, box }),
    event: {
      type: "RevertRedeemIntentConfirmed",
      messageHash: a.messageHash,
      redeemer: record.message.sender,
      redeemerNonce: record.message.nonce,
      amount: record.amount,
    },
  };
};

/* ── activation ──────────────────────────────────────────── */
const setActivation = (s: OriginState, activated: boolean, ctx: CallContext): Result => {
  const g = s.gateway;
  assertOrganization(g, ctx);
  assertLinked(g);
  ensure(
    g.activated !== activated,
    "status",
    activated ? "Gateway is already activated." : "Gateway is already deactivated.",
  );
  ctx.gas.write();
  return {
    state: withGateway(s, { ...g, activated }),
    event: { type: "GatewayActivationChanged", activated },
  };
};

/* ── command-level reducer ───────────────────────────────── */
export const applyOriginCommand = (
  s: OriginState,
  cmd: OriginCommand,
  ctx: CallContext,
): Result => {
  switch (cmd.type) {
    /* ---------- linking & housekeeping ------------------------------ */
    case "initiateGatewayLink": {
      const r = initiateGatewayLink(s.gateway, cmd, ctx);
      return { state: withGateway(s, r.state), event: r.event };
    }
    case "progressGatewayLink": {
      const r = progressGatewayLink(s.gateway, cmd, ctx);
      return { state: withGateway(s, r.state), event: r.event };
    }
    case "progressGatewayLinkWithProof": {
      const r = progressGatewayLinkWithProof(s.gateway, cmd, ctx);
      return { state: withGateway(s, r.state), event: r.event };
    }
    case "activateGateway":
      return setActivation(s, true, ctx);
    case "deactivateGateway":
      return setActivation(s, false, ctx);
    case "proveGateway": {
      const r = proveGateway(s.gateway, cmd, ctx);
      return { state: withGateway(s, r.state), event: r.event };
    }

    /* ---------- stake-and-mint (outbox) ----------------------------- */
    case "stake":
      return stake(s, cmd, ctx);
    case "progressStake":
      return progressStake(s, cmd, ctx);
    case "progressStakeWithProof":
      return progressStakeWithProof(s, cmd, ctx);
    case "revertStake":
      return revertStake(s, cmd.messageHash, ctx);
    case "progressRevertStake":
      return progressRevertStake(s, cmd, ctx);

    /* ---------- redeem-and-unstake (inbox) -------------------------- */
    case "confirmRedeemIntent":
      return confirmRedeemIntent(s, cmd, ctx);
    case "progressUnstake":
      return progressUnstake(s, cmd, ctx);
    case "progressUnstakeWithProof":
      return progressUnstakeWithProof(s, cmd, ctx);
    case "confirmRevertRedeemIntent":
      return confirmRevertRedeemIntent(s, cmd, ctx);
  }
};

/* ── chain view ──────────────────────────────────────────── */

/** Accounts the origin chain commits; the gateway carries the message boxes. */
export const originAccounts = (s: OriginState): Map<Address, Array<[Hex, Uint8Array]>> =>
  new Map<Address, Array<[Hex, Uint8Array]>>([
    [s.gateway.address, endpointStorage(s.gateway)],
    [s.valueToken.address, []],
    [s.baseToken.address, []],
  ]);
