import { keccak_256 as keccak } from "@noble/hashes/sha3";
import { hexToBytes, isHex } from "viem";
import {
  decodeAccount,
  decodeParentNodes,
  encodeItem,
  isList,
  type RlpItem,
} from "../codec/rlp";
import { ensure, fail } from "../core/errors";
import type { Address, Hex } from "../types";
import { equalBytes, toNibbles } from "../utils/bytes";

const PROOF_FAILED = "Merkle proof verification failed.";

/** Decodes a hex-prefix path into nibbles and its leaf flag. */
const decodePath = (encoded: Uint8Array): { leaf: boolean; path: number[] } => {
  ensure(encoded.length > 0, "proof", "Trie node path is empty.");
  const flag = encoded[0] >> 4;
  ensure(flag <= 3, "proof", `Unknown trie node path flag ${flag}.`);
  const nibbles = toNibbles(encoded);
  const odd = (flag & 1) === 1;
  if (!odd) ensure(nibbles[1] === 0, "proof", "Even trie path must pad with zero.");
  return { leaf: flag >= 2, path: nibbles.slice(odd ? 1 : 2) };
};

const asBytes = (item: RlpItem | undefined, what: string): Uint8Array => {
  ensure(item instanceof Uint8Array, "proof", `${what} must be a byte string.`);
  return item;
};

/**
 * Walks `parentNodes` from `rootHash` along `path` and returns the leaf value.
 * Hashed children must be resolved by the next proof node; nodes under
 * 32 bytes arrive embedded in their parent.
 */
export const verifyProof = (
  rootHash: Uint8Array,
  path: Uint8Array,
  parentNodes: Hex,
): Uint8Array => {
  ensure(rootHash.length === 32, "proof", "Trie root must be 32 bytes.");
  const nodes = decodeParentNodes(parentNodes);
  const nibbles = toNibbles(path);
  // every node but the last consumes at least one nibble
  ensure(nodes.length <= nibbles.length + 1, "proof", "Proof exceeds the depth allowed by the key.");

  let pointer = 0;
  let used = 0;
  let next: RlpItem = rootHash;

  for (;;) {
    let node: RlpItem[];
    if (isList(next)) {
      node = next;
    } else {
      ensure(next.length === 32, "proof", PROOF_FAILED);
      const candidate = nodes[used++];
      ensure(candidate !== undefined, "proof", "Proof ends before reaching the leaf.");
      ensure(equalBytes(keccak(encodeItem(candidate)), next), "proof", PROOF_FAILED);
      node = candidate;
    }

    if (node.length === 17) {
      if (pointer === nibbles.length) {
        const value = asBytes(node[16], "Branch value");
        ensure(value.length > 0, "proof", PROOF_FAILED);
        ensure(used === nodes.length, "proof", "Proof carries unused nodes.");
        return value;
      }
      const child = node[nibbles[pointer]];
      pointer += 1;
      ensure(isList(child) || child.length > 0, "proof", PROOF_FAILED);
      next = child;
      continue;
    }

    if (node.length === 2) {
      const { leaf, path: segment } = decodePath(asBytes(node[0], "Trie node path"));
      const actual = nibbles.slice(pointer, pointer + segment.length);
      ensure(
        actual.length === segment.length && actual.every((n, i) => n === segment[i]),
        "proof",
        "Proof path does not match the key.",
      );
      pointer += segment.length;
      if (leaf) {
        ensure(pointer === nibbles.length, "proof", "Proof path does not match the key.");
        ensure(used === nodes.length, "proof", "Proof carries unused nodes.");
        return asBytes(node[1], "Leaf value");
      }
      ensure(segment.length > 0, "proof", "Extension node has an empty path.");
      next = node[1];
      continue;
    }

    return fail("proof", `Malformed trie node with ${node.length} items.`);
  }
};

/**
 * Proves the account leaf of `address` under a trusted state root and returns
 * its storage root.
 */
export const verifyAccount = (
  encodedAccount: Hex,
  parentNodes: Hex,
  address: Address,
  stateRoot: Hex,
): Hex => {
  ensure(isHex(encodedAccount) && encodedAccount.length > 2, "argument", "RLP encoded account must not be zero.");
  ensure(isHex(parentNodes) && parentNodes.length > 2, "argument", "RLP parent nodes must not be zero.");
  const path = keccak(hexToBytes(address));
  const leaf = verifyProof(hexToBytes(stateRoot), path, parentNodes);
  ensure(equalBytes(leaf, hexToBytes(encodedAccount)), "proof", "Account proof does not match the encoded account.");
  return decodeAccount(leaf).storageRoot;
};

/** Proves a storage slot under a trusted storage root and returns its raw value. */
export const verifyStorage = (
  slotKey: Hex,
  parentNodes: Hex,
  storageRoot: Hex,
): Uint8Array => {
  ensure(isHex(parentNodes) && parentNodes.length > 2, "argument", "RLP parent nodes must not be zero.");
  return verifyProof(hexToBytes(storageRoot), keccak(hexToBytes(slotKey)), parentNodes);
};
