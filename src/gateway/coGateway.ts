import { zeroHash } from "viem";
import { toAddress } from "../core/address";
import { burn, mint, transfer, type Ledger } from "../chain/ledger";
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
import { emptyRegistry, getRecord, initiateNewProcess, updateRecord } from "../core/registry";
import { MessageStatus, type Message, type Mint, type Redeem } from "../core/types";
import type { Address, Hex, Transition } from "../types";
import {
  assertLinked,
  endpointStorage,
  checkTransferTerms,
  ensureBytes32,
  ensureProofBytes,
  penaltyFor,
  proveGateway,
  storageRootAt,
} from "./base";
import {
  confirmGatewayLinkIntent,
  progressGatewayLink,
  progressGatewayLinkWithProof,
} from "./link";
import type {
  AuxiliaryCommand,
  AuxiliaryEvent,
  AuxiliaryState,
  CallContext,
  CoGatewayState,
  ConfirmIntentArgs,
  ProofProgressArgs,
  RevocationProofArgs,
  SecretArgs,
  TokenMetadata,
  TransferIntentArgs,
} from "./types";

type Result = Transition<AuxiliaryState, AuxiliaryEvent>;

export interface CoGatewayParams {
  address: Address;
  gateway: Address;
  /** value token on origin, part of the link terms */
  valueToken: Address;
  organization: Address;
  burner: Address;
  bounty: bigint;
  metadata: TokenMetadata;
}

export const createCoGateway = (
  p: CoGatewayParams,
  utilityToken: Ledger,
  baseCoin: Ledger,
): AuxiliaryState => ({
  coGateway: {
    role: "auxiliary",
    address: p.address,
    remote: p.gateway,
    organization: p.organization,
    burner: p.burner,
    bounty: p.bounty,
    valueToken: p.valueToken,
    utilityToken: utilityToken.address,
    metadata: p.metadata,
    linked: false,
    box: emptyMessageBox(),
    storageRoots: new Map(),
    mints: emptyRegistry(),
    redeems: emptyRegistry(),
  },
  utilityToken,
  baseCoin,
});

const withCoGateway = (s: AuxiliaryState, coGateway: CoGatewayState): AuxiliaryState => ({
  ...s,
  coGateway,
});

/* ── stake intents (inbox) ───────────────────────────────── */
const confirmStakeIntent = (
  s: AuxiliaryState,
  a: ConfirmIntentArgs,
  ctx: CallContext,
): Result => {
  const c = s.coGateway;
  assertLinked(c);
  const beneficiary = checkTransferTerms(a.amount, a.beneficiary, a.hashLock);
  const sender = toAddress(a.sender, "Staker");
  ensureProofBytes(a.rlpParentNodes);

  const terms: Message = {
    intentHash: hashStakeIntent(a.amount, beneficiary, c.remote),
    nonce: a.nonce,
    gasPrice: a.gasPrice,
    gasLimit: a.gasLimit,
    sender,
    hashLock: a.hashLock,
    gasConsumed: 0n,
  };
  const messageHash = messageDigest(terms);
  const box = confirm(c.box, messageHash, a.rlpParentNodes, storageRootAt(c, a.blockHeight));
  ctx.gas.calldata(a.rlpParentNodes);
  ctx.gas.write(3);

  const message: Message = { ...terms, gasConsumed: ctx.gas.used() };
  const mints = initiateNewProcess(
    c.mints,
    sender,
    a.nonce,
    messageHash,
    { amount: a.amount, beneficiary, message },
    (h) => statusOf(box, "inbox", h),
  );

  return {
    state: withCoGateway(s, { ...c, box, mints }),
    event: {
      type: "StakeIntentConfirmed",
      messageHash,
      staker: sender,
      stakerNonce: a.nonce,
      beneficiary,
      amount: a.amount,
      blockHeight: a.blockHeight,
      hashLock: a.hashLock,
    },
  };
};

// amount - fee to the beneficiary, the fee to the caller; zero amounts are skipped
const settleMint = (
  s: AuxiliaryState,
  coGateway: CoGatewayState,
  record: Mint,
  messageHash: Hex,
  ctx: CallContext,
  unlockSecret?: Hex,
): Result => {
  const { fee } = computeReward(record.message, ctx.gas, record.amount);
  const mintedAmount = record.amount - fee;
  let utilityToken = s.utilityToken;
  if (mintedAmount > 0n) utilityToken = mint(utilityToken, record.beneficiary, mintedAmount);
  if (fee > 0n) utilityToken = mint(utilityToken, ctx.sender, fee);

  return {
    state: { ...s, coGateway, utilityToken },
    event: {
      type: "MintProgressed",
      messageHash,
      staker: record.message.sender,
      beneficiary: record.beneficiary,
      stakeAmount: record.amount,
      mintedAmount,
      rewardAmount: fee,
      proofProgress: unlockSecret === undefined,
      unlockSecret: unlockSecret ?? zeroHash,
    },
  };
};

const progressMint = (s: AuxiliaryState, a: SecretArgs, ctx: CallContext): Result => {
  const c = s.coGateway;
  const record = getRecord(c.mints, a.messageHash);
  const box = progress(c.box, "inbox", a.messageHash, record.message, a.unlockSecret);
  ctx.gas.write();
  return settleMint(s, { ...c, box }, record, a.messageHash, ctx, a.unlockSecret);
};

const progressMintWithProof = (
  s: AuxiliaryState,
  a: ProofProgressArgs,
  ctx: CallContext,
): Result => {
  const c = s.coGateway;
  const record = getRecord(c.mints, a.messageHash);
  const box = progressWithProof(
    c.box,
    "inbox",
    a.messageHash,
    a.rlpParentNodes,
    storageRootAt(c, a.blockHeight),
    a.messageStatus,
  );
  ctx.gas.calldata(a.rlpParentNodes);
  ctx.gas.write();
  return settleMint(s, { ...c, box }, record, a.messageHash, ctx);
};

const confirmRevertStakeIntent = (
  s: AuxiliaryState,
  a: RevocationProofArgs,
  ctx: CallContext,
): Result => {
  const c = s.coGateway;
  const record = getRecord(c.mints, a.messageHash);
  const box = confirmRevocation(
    c.box,
    a.messageHash,
    a.rlpParentNodes,
    storageRootAt(c, a.blockHeight),
  );
  ctx.gas.calldata(a.rlpParentNodes);
  ctx.gas.write();
  return {
    state: withCoGateway(s, { ...c, box }),
    event: {
      type: "RevertStakeIntentConfirmed",
      messageHash: a.messageHash,
      staker: record.message.sender,
      stakerNonce: record.message.nonce,
      amount: record.amount,
    },
  };
};

/* ── redeem (outbox) ─────────────────────────────────────── */
const redeem = (s: AuxiliaryState, a: TransferIntentArgs, ctx: CallContext): Result => {
  const c = s.coGateway;
  assertLinked(c);
  const beneficiary = checkTransferTerms(a.amount, a.beneficiary, a.hashLock);
  ensure(
    a.amount > maxReward(a.gasPrice, a.gasLimit),
    "arithmetic",
    "Maximum possible reward must be less than the redeem amount.",
  );

  const redeemer = ctx.sender;
  const message: Message = {
    intentHash: hashRedeemIntent(a.amount, beneficiary, c.address),
    nonce: a.nonce,
    gasPrice: a.gasPrice,
    gasLimit: a.gasLimit,
    sender: redeemer,
    hashLock: a.hashLock,
    gasConsumed: 0n,
  };
  const messageHash = messageDigest(message);
  const redeems = initiateNewProcess(
    c.redeems,
    redeemer,
    a.nonce,
    messageHash,
    { amount: a.amount, beneficiary, bounty: c.bounty, message },
    (h) => statusOf(c.box, "outbox", h),
  );
  const box = declare(c.box, messageHash);
  ctx.gas.write(3);

  return {
    state: {
      coGateway: { ...c, redeems, box },
      utilityToken: transfer(s.utilityToken, redeemer, c.address, a.amount),
      baseCoin: transfer(s.baseCoin, redeemer, c.address, c.bounty),
    },
    event: {
      type: "RedeemIntentDeclared",
      messageHash,
      redeemer,
      redeemerNonce: a.nonce,
      beneficiary,
      amount: a.amount,
    },
  };
};

// escrowed tokens are burnt, the bounty goes to the caller
const settleRedeem = (
  s: AuxiliaryState,
  coGateway: CoGatewayState,
  record: Redeem,
  messageHash: Hex,
  ctx: CallContext,
  unlockSecret?: Hex,
): Result => {
  const redeems = updateRecord(coGateway.redeems, messageHash, (r) => ({
    ...r,
    facilitator: ctx.sender,
  }));
  return {
    state: {
      coGateway: { ...coGateway, redeems },
      utilityToken: burn(s.utilityToken, coGateway.address, record.amount),
      baseCoin: transfer(s.baseCoin, coGateway.address, ctx.sender, record.bounty),
    },
    event: {
      type: "RedeemProgressed",
      messageHash,
      redeemer: record.message.sender,
      redeemerNonce: record.message.nonce,
      amount: record.amount,
      proofProgress: unlockSecret === undefined,
      unlockSecret: unlockSecret ?? zeroHash,
    },
  };
};

const progressRedeem = (s: AuxiliaryState, a: SecretArgs, ctx: CallContext): Result => {
  const c = s.coGateway;
  const record = getRecord(c.redeems, a.messageHash);
  const box = progress(c.box, "outbox", a.messageHash, record.message, a.unlockSecret);
  ctx.gas.write(2);
  return settleRedeem(s, { ...c, box }, record, a.messageHash, ctx, a.unlockSecret);
};

const progressRedeemWithProof = (
  s: AuxiliaryState,
  a: ProofProgressArgs,
  ctx: CallContext,
): Result => {
  const c = s.coGateway;
  const record = getRecord(c.redeems, a.messageHash);
  const box = progressWithProof(
    c.box,
    "outbox",
    a.messageHash,
    a.rlpParentNodes,
    storageRootAt(c, a.blockHeight),
    a.messageStatus,
  );
  ctx.gas.calldata(a.rlpParentNodes);
  ctx.gas.write(2);
  return settleRedeem(s, { ...c, box }, record, a.messageHash, ctx);
};

/* ── redeem revocation ───────────────────────────────────── */
const revertRedemption = (s: AuxiliaryState, messageHash: Hex, ctx: CallContext): Result => {
  const c = s.coGateway;
  const record = getRecord(c.redeems, messageHash);
  ensure(ctx.sender === record.message.sender, "access", "Only redeemer can revert redemption.");
  const box = declareRevocation(c.box, messageHash);
  ctx.gas.write();

  return {
    state: {
      ...s,
      coGateway: { ...c, box },
      baseCoin: transfer(s.baseCoin, ctx.sender, c.address, penaltyFor(record.bounty)),
    },
    event: {
      type: "RevertRedeemDeclared",
      messageHash,
      redeemer: ctx.sender,
      redeemerNonce: record.message.nonce,
      amount: record.amount,
    },
  };
};

const progressRevertRedemption = (
  s: AuxiliaryState,
  a: RevocationProofArgs,
  ctx: CallContext,
): Result => {
  const c = s.coGateway;
  const record = getRecord(c.redeems, a.messageHash);
  const box = progressRevocationWithProof(
    c.box,
    a.messageHash,
    a.rlpParentNodes,
    storageRootAt(c, a.blockHeight),
    MessageStatus.Revoked,
  );
  ctx.gas.calldata(a.rlpParentNodes);
  ctx.gas.write();

  const redeemer = record.message.sender;
  return {
    state: {
      coGateway: { ...c, box },
      utilityToken: transfer(s.utilityToken, c.address, redeemer, record.amount),
      baseCoin: transfer(
        s.baseCoin,
        c.address,
        c.burner,
        record.bounty + penaltyFor(record.bounty),
      ),
    },
    event: {
      type: "RedeemReverted",
      messageHash: a.messageHash,
      redeemer,
      redeemerNonce: record.message.nonce,
      amount: record.amount,
    },
  };
};

/* ── command-level reducer ───────────────────────────────── */
export const applyAuxiliaryCommand = (
  s: AuxiliaryState,
  cmd: AuxiliaryCommand,
  ctx: CallContext,
): Result => {
  switch (cmd.type) {
    /* ---------- linking & housekeeping ------------------------------ */
    case "confirmGatewayLinkIntent": {
      const r = confirmGatewayLinkIntent(s.coGateway, cmd, ctx);
      return { state: withCoGateway(s, r.state), event: r.event };
    }
    case "progressGatewayLink": {
      const r = progressGatewayLink(s.coGateway, cmd, ctx);
      return { state: withCoGateway(s, r.state), event: r.event };
    }
    case "progressGatewayLinkWithProof": {
      const r = progressGatewayLinkWithProof(s.coGateway, cmd, ctx);
      return { state: withCoGateway(s, r.state), event: r.event };
    }
    case "proveGateway": {
      const r = proveGateway(s.coGateway, cmd, ctx);
      return { state: withCoGateway(s, r.state), event: r.event };
    }

    /* ---------- stake-and-mint (inbox) ------------------------------ */
    case "confirmStakeIntent":
      return confirmStakeIntent(s, cmd, ctx);
    case "progressMint":
      return progressMint(s, cmd, ctx);
    case "progressMintWithProof":
      return progressMintWithProof(s, cmd, ctx);
    case "confirmRevertStakeIntent":
      return confirmRevertStakeIntent(s, cmd, ctx);

    /* ---------- redeem-and-unstake (outbox) ------------------------- */
    case "redeem":
      return redeem(s, cmd, ctx);
    case "progressRedeem":
      return progressRedeem(s, cmd, ctx);
    case "progressRedeemWithProof":
      return progressRedeemWithProof(s, cmd, ctx);
    case "revertRedemption":
      return revertRedemption(s, cmd.messageHash, ctx);
    case "progressRevertRedemption":
      return progressRevertRedemption(s, cmd, ctx);
  }
};

/* ── chain view ──────────────────────────────────────────── */
export const auxiliaryAccounts = (s: AuxiliaryState): Map<Address, Array<[Hex, Uint8Array]>> =>
  new Map<Address, Array<[Hex, Uint8Array]>>([
    [s.coGateway.address, endpointStorage(s.coGateway)],
    [s.utilityToken.address, []],
    [s.baseCoin.address, []],
  ]);
