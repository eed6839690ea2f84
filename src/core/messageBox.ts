import { isHex, zeroHash } from "viem";
import { decodeStorageValue } from "../codec/rlp";
import { verifyStorage } from "../trie/proof";
import type { Hex } from "../types";
import { ensure } from "./errors";
import { hashLockOf, storageSlotKey } from "./hash";
import { MessageStatus, type BoxSide, type Message, type MessageBox } from "./types";

/* ── storage layout shared by both endpoints ─────────────── */
export const OUTBOX_SLOT = 7n;
export const INBOX_SLOT = 8n;

// a local outbox entry is mirrored by the remote inbox and vice versa
const counterpartSlot = (side: BoxSide): bigint =>
  side === "outbox" ? INBOX_SLOT : OUTBOX_SLOT;

const HASH_RE = /^0x[0-9a-f]{64}$/;

/* ── helpers ─────────────────────────────────────────────── */
export const emptyMessageBox = (): MessageBox => ({ outbox: new Map(), inbox: new Map() });

export const statusOf = (box: MessageBox, side: BoxSide, messageHash: Hex): MessageStatus =>
  box[side].get(messageHash) ?? MessageStatus.Undeclared;

export const isTerminal = (status: MessageStatus): boolean =>
  status === MessageStatus.Progressed || status === MessageStatus.Revoked;

export const ensureMessageHash = (messageHash: Hex): void => {
  ensure(messageHash !== zeroHash, "argument", "Message hash must not be zero.");
  ensure(HASH_RE.test(messageHash), "argument", "Message hash must be 32 lowercase hex bytes.");
};

const ensureProofInputs = (messageHash: Hex, rlpParentNodes: Hex, storageRoot: Hex): void => {
  ensureMessageHash(messageHash);
  ensure(rlpParentNodes.length > 2, "argument", "RLP parent nodes must not be zero.");
  ensure(storageRoot !== zeroHash, "anchor", "Storage root must not be zero.");
};

const sideName = (side: BoxSide) => (side === "outbox" ? "source" : "target");

const write = (box: MessageBox, side: BoxSide, messageHash: Hex, status: MessageStatus): MessageBox => {
  const next = new Map(box[side]).set(messageHash, status);
  return side === "outbox" ? { ...box, outbox: next } : { ...box, inbox: next };
};

/** Proves that the counterpart's `slot` mapping holds `expected` for the hash. */
export const proveStatus = (
  storageRoot: Hex,
  slot: bigint,
  messageHash: Hex,
  expected: MessageStatus,
  rlpParentNodes: Hex,
): void => {
  const value = verifyStorage(storageSlotKey(slot, messageHash), rlpParentNodes, storageRoot);
  ensure(
    decodeStorageValue(value) === BigInt(expected),
    "proof",
    "Merkle proof verification failed.",
  );
};

/* ── transitions ─────────────────────────────────────────── */

/** Undeclared → Declared on the outbox of the originating side. */
export const declare = (box: MessageBox, messageHash: Hex): MessageBox => {
  ensureMessageHash(messageHash);
  ensure(
    statusOf(box, "outbox", messageHash) === MessageStatus.Undeclared,
    "status",
    "Message on source must be Undeclared.",
  );
  return write(box, "outbox", messageHash, MessageStatus.Declared);
};

/**
 * Undeclared → Declared on the inbox, after proving the counterpart outbox
 * holds Declared for the same hash.
 */
export const confirm = (
  box: MessageBox,
  messageHash: Hex,
  rlpParentNodes: Hex,
  storageRoot: Hex,
): MessageBox => {
  ensureProofInputs(messageHash, rlpParentNodes, storageRoot);
  ensure(
    statusOf(box, "inbox", messageHash) === MessageStatus.Undeclared,
    "status",
    "Message on target must be Undeclared.",
  );
  proveStatus(storageRoot, OUTBOX_SLOT, messageHash, MessageStatus.Declared, rlpParentNodes);
  return write(box, "inbox", messageHash, MessageStatus.Declared);
};

/** Declared → Progressed by revealing the preimage of the hash lock. */
export const progress = (
  box: MessageBox,
  side: BoxSide,
  messageHash: Hex,
  message: Message,
  unlockSecret: Hex,
): MessageBox => {
  ensureMessageHash(messageHash);
  ensure(
    statusOf(box, side, messageHash) === MessageStatus.Declared,
    "status",
    `Message on ${sideName(side)} must be Declared.`,
  );
  ensure(isHex(unlockSecret, { strict: true }), "argument", "Unlock secret must be hex.");
  ensure(
    hashLockOf(unlockSecret) === message.hashLock.toLowerCase(),
    "argument",
    "Invalid unlock secret.",
  );
  return write(box, side, messageHash, MessageStatus.Progressed);
};

/**
 * Declared → Progressed without the secret: the counterpart entry is proven to
 * be Declared or Progressed, either of which shows the other side committed.
 */
export const progressWithProof = (
  box: MessageBox,
  side: BoxSide,
  messageHash: Hex,
  rlpParentNodes: Hex,
  storageRoot: Hex,
  claimedStatus: MessageStatus,
): MessageBox => {
  ensureProofInputs(messageHash, rlpParentNodes, storageRoot);
  ensure(
    claimedStatus === MessageStatus.Declared || claimedStatus === MessageStatus.Progressed,
    "argument",
    "Message on counterpart must be Declared or Progressed.",
  );
  ensure(
    statusOf(box, side, messageHash) === MessageStatus.Declared,
    "status",
    `Message on ${sideName(side)} must be Declared.`,
  );
  proveStatus(storageRoot, counterpartSlot(side), messageHash, claimedStatus, rlpParentNodes);
  return write(box, side, messageHash, MessageStatus.Progressed);
};

/** Declared → DeclaredRevocation on the outbox; only the sender may call it. */
export const declareRevocation = (box: MessageBox, messageHash: Hex): MessageBox => {
  ensureMessageHash(messageHash);
  ensure(
    statusOf(box, "outbox", messageHash) === MessageStatus.Declared,
    "status",
    "Message on source must be Declared.",
  );
  return write(box, "outbox", messageHash, MessageStatus.DeclaredRevocation);
};

/** Declared → Revoked on the inbox once the counterpart outbox is DeclaredRevocation. */
export const confirmRevocation = (
  box: MessageBox,
  messageHash: Hex,
  rlpParentNodes: Hex,
  storageRoot: Hex,
): MessageBox => {
  ensureProofInputs(messageHash, rlpParentNodes, storageRoot);
  ensure(
    statusOf(box, "inbox", messageHash) === MessageStatus.Declared,
    "status",
    "Message on target must be Declared.",
  );
  proveStatus(
    storageRoot,
    OUTBOX_SLOT,
    messageHash,
    MessageStatus.DeclaredRevocation,
    rlpParentNodes,
  );
  return write(box, "inbox", messageHash, MessageStatus.Revoked);
};

/** DeclaredRevocation → Revoked on the outbox once the counterpart inbox agrees. */
export const progressRevocationWithProof = (
  box: MessageBox,
  messageHash: Hex,
  rlpParentNodes: Hex,
  storageRoot: Hex,
  claimedStatus: MessageStatus,
): MessageBox => {
  ensureProofInputs(messageHash, rlpParentNodes, storageRoot);
  ensure(
    claimedStatus === MessageStatus.DeclaredRevocation || claimedStatus === MessageStatus.Revoked,
    "argument",
    "Message on counterpart must be DeclaredRevocation or Revoked.",
  );
  ensure(
    statusOf(box, "outbox", messageHash) === MessageStatus.DeclaredRevocation,
    "status",
    "Message on source must be DeclaredRevocation.",
  );
  proveStatus(storageRoot, INBOX_SLOT, messageHash, claimedStatus, rlpParentNodes);
  return write(box, "outbox", messageHash, MessageStatus.Revoked);
};
