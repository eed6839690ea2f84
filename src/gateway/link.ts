import { zeroHash } from "viem";
import { toAddress } from "../core/address";
import { ensure } from "../core/errors";
import { hashLinkIntent, messageDigest, type LinkTerms } from "../core/hash";
import { confirm, declare, progress, progressWithProof } from "../core/messageBox";
import type { BoxSide, GatewayLink, Message } from "../core/types";
import type { Hex } from "../types";
import {
  assertOrganization,
  ensureBytes32,
  ensureProofBytes,
  storageRootAt,
} from "./base";
import type {
  CallContext,
  ConfirmLinkArgs,
  EndpointEvent,
  EndpointState,
  InitiateLinkArgs,
  ProofProgressArgs,
  SecretArgs,
} from "./types";

// One-time handshake that flips `linked` on both endpoints. It travels as an
// ordinary message: declared on origin, confirmed on auxiliary, progressed on
// both.

type LinkResult<S> = { state: S; event: EndpointEvent };

const linkTerms = (s: EndpointState, nonce: bigint): LinkTerms => {
  const origin = s.role === "origin";
  return {
    gateway: origin ? s.address : s.remote,
    coGateway: origin ? s.remote : s.address,
    bounty: s.bounty,
    tokenName: s.metadata.name,
    tokenSymbol: s.metadata.symbol,
    tokenDecimals: s.metadata.decimals,
    nonce,
    token: s.valueToken,
  };
};

const pair = (s: EndpointState) =>
  s.role === "origin"
    ? { gateway: s.address, coGateway: s.remote }
    : { gateway: s.remote, coGateway: s.address };

// origin declares the link in its outbox, auxiliary confirms it into its inbox
const linkSide = (s: EndpointState): BoxSide => (s.role === "origin" ? "outbox" : "inbox");

const ensureUnlinked = (s: EndpointState): void => {
  ensure(!s.linked, "status", "Gateway is already linked.");
  ensure(s.link === undefined, "status", "Linking is already initiated.");
};

const activeLink = (s: EndpointState, messageHash: Hex): GatewayLink => {
  const link = s.link;
  ensure(link !== undefined, "status", "Linking is not initiated.");
  ensure(link.messageHash === messageHash, "argument", "Invalid message hash.");
  return link;
};

/* ── origin: declare ─────────────────────────────────────── */
export const initiateGatewayLink = <S extends EndpointState>(
  s: S,
  args: InitiateLinkArgs,
  ctx: CallContext,
): LinkResult<S> => {
  assertOrganization(s, ctx);
  ensureUnlinked(s);
  ensureBytes32(args.hashLock, "Hash lock");

  const message: Message = {
    intentHash: hashLinkIntent(linkTerms(s, args.nonce)),
    nonce: args.nonce,
    gasPrice: 0n,
    gasLimit: 0n,
    sender: ctx.sender,
    hashLock: args.hashLock,
    gasConsumed: 0n,
  };
  const messageHash = messageDigest(message);
  const box = declare(s.box, messageHash);
  ctx.gas.write(2);

  return {
    state: { ...s, box, link: { messageHash, message } },
    event: { type: "GatewayLinkDeclared", messageHash, ...pair(s) },
  };
};

/* ── auxiliary: confirm ──────────────────────────────────── */
export const confirmGatewayLinkIntent = <S extends EndpointState>(
  s: S,
  args: ConfirmLinkArgs,
  ctx: CallContext,
): LinkResult<S> => {
  ensureUnlinked(s);
  const sender = toAddress(args.sender, "Sender");
  ensureBytes32(args.hashLock, "Hash lock");
  ensureProofBytes(args.rlpParentNodes);

  const terms: Message = {
    intentHash: hashLinkIntent(linkTerms(s, args.nonce)),
    nonce: args.nonce,
    gasPrice: 0n,
    gasLimit: 0n,
    sender,
    hashLock: args.hashLock,
    gasConsumed: 0n,
  };
  const messageHash = messageDigest(terms);
  const box = confirm(s.box, messageHash, args.rlpParentNodes, storageRootAt(s, args.blockHeight));
  ctx.gas.calldata(args.rlpParentNodes);
  ctx.gas.write(2);
  const message: Message = { ...terms, gasConsumed: ctx.gas.used() };

  return {
    state: { ...s, box, link: { messageHash, message } },
    event: { type: "GatewayLinkConfirmed", messageHash, ...pair(s) },
  };
};

/* ── both: progress ──────────────────────────────────────── */
export const progressGatewayLink = <S extends EndpointState>(
  s: S,
  args: SecretArgs,
  ctx: CallContext,
): LinkResult<S> => {
  const link = activeLink(s, args.messageHash);
  const box = progress(s.box, linkSide(s), link.messageHash, link.message, args.unlockSecret);
  ctx.gas.write(2);
  return {
    state: { ...s, box, linked: true },
    event: {
      type: "GatewayLinkProgressed",
      messageHash: link.messageHash,
      proofProgress: false,
      unlockSecret: args.unlockSecret,
    },
  };
};

export const progressGatewayLinkWithProof = <S extends EndpointState>(
  s: S,
  args: ProofProgressArgs,
  ctx: CallContext,
): LinkResult<S> => {
  const link = activeLink(s, args.messageHash);
  const box = progressWithProof(
    s.box,
    linkSide(s),
    link.messageHash,
    args.rlpParentNodes,
    storageRootAt(s, args.blockHeight),
    args.messageStatus,
  );
  ctx.gas.calldata(args.rlpParentNodes);
  ctx.gas.write(2);
  return {
    state: { ...s, box, linked: true },
    event: {
      type: "GatewayLinkProgressed",
      messageHash: link.messageHash,
      proofProgress: true,
      unlockSecret: zeroHash,
    },
  };
};
