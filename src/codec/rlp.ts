// RLP helpers for trie nodes, account leaves and storage values.

import * as rlp from "rlp";
import { bytesToHex, hexToBytes } from "viem";
import { ProtocolError, ensure } from "../core/errors";
import type { Hex } from "../types";
import { bytesToBigInt } from "../utils/bytes";

export type RlpItem = Uint8Array | RlpItem[];

/* ── helpers ── */
const describe = (e: unknown) => (e instanceof Error ? e.message : String(e));

/** Decodes one RLP item; malformed input is a proof failure. */
export const decodeItem = (bytes: Uint8Array): RlpItem => {
  try {
    return rlp.decode(bytes);
  } catch (e) {
    throw new ProtocolError("proof", `Malformed RLP encoding: ${describe(e)}`);
  }
};

export const encodeItem = (item: RlpItem): Uint8Array => rlp.encode(item);

export const isList = (item: RlpItem): item is RlpItem[] => Array.isArray(item);

/* ── account leaf ── */
export interface AccountRecord {
  nonce: bigint;
  balance: bigint;
  storageRoot: Hex;
  codeHash: Hex;
}

export const encodeAccount = (a: AccountRecord): Uint8Array =>
  rlp.encode([
    a.nonce,
    a.balance,
    hexToBytes(a.storageRoot),
    hexToBytes(a.codeHash),
  ]);

export const decodeAccount = (bytes: Uint8Array): AccountRecord => {
  const item = decodeItem(bytes);
  ensure(isList(item) && item.length === 4, "proof", "Account leaf must be a 4-item list.");
  const [nonce, balance, storageRoot, codeHash] = item;
  ensure(
    nonce instanceof Uint8Array &&
      balance instanceof Uint8Array &&
      storageRoot instanceof Uint8Array &&
      codeHash instanceof Uint8Array,
    "proof",
    "Account leaf fields must be byte strings.",
  );
  ensure(
    storageRoot.length === 32 && codeHash.length === 32,
    "proof",
    "Account storage root and code hash must be 32 bytes.",
  );
  return {
    nonce: bytesToBigInt(nonce),
    balance: bytesToBigInt(balance),
    storageRoot: bytesToHex(storageRoot),
    codeHash: bytesToHex(codeHash),
  };
};

/* ── storage value ── */
export const encodeStorageValue = (v: bigint): Uint8Array => rlp.encode(v);

export const decodeStorageValue = (bytes: Uint8Array): bigint => {
  const item = decodeItem(bytes);
  ensure(item instanceof Uint8Array, "proof", "Storage value must be a byte string.");
  ensure(item.length <= 32, "proof", "Storage value exceeds 32 bytes.");
  return bytesToBigInt(item);
};

/* ── parent-node list (proof wire format) ── */

/** Packs individually RLP-encoded trie nodes into one RLP list. */
export const encodeParentNodes = (nodes: readonly Uint8Array[]): Hex =>
  bytesToHex(rlp.encode(nodes.map((n) => decodeItem(n))));

export const decodeParentNodes = (encoded: Hex): RlpItem[][] => {
  const item = decodeItem(hexToBytes(encoded));
  ensure(isList(item), "proof", "Parent nodes must be an RLP list.");
  const nodes: RlpItem[][] = [];
  for (const node of item) {
    ensure(isList(node), "proof", "Every parent node must be an RLP list.");
    nodes.push(node);
  }
  return nodes;
};
