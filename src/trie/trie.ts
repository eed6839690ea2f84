import { keccak_256 as keccak } from "@noble/hashes/sha3";
import { bytesToHex } from "viem";
import { encodeItem, type RlpItem } from "../codec/rlp";
import type { Hex } from "../types";
import { toNibbles } from "../utils/bytes";

/** keccak(rlp("")) */
export const EMPTY_TRIE_ROOT: Hex =
  "0x56e81f171bcc55a6ff8345e692c0f86e5b48e01b996cadc001622fb5e363b421";

type TrieNode =
  | { kind: "leaf"; path: number[]; value: Uint8Array }
  | { kind: "extension"; path: number[]; child: TrieNode }
  | { kind: "branch"; children: (TrieNode | undefined)[]; value?: Uint8Array };

interface Entry {
  nibbles: number[];
  value: Uint8Array;
}

/* ── hex-prefix encoding of a nibble path ─────────────────── */
export const hexPrefix = (path: readonly number[], leaf: boolean): Uint8Array => {
  const odd = path.length % 2 === 1;
  const flag = (leaf ? 2 : 0) + (odd ? 1 : 0);
  const out = new Uint8Array(Math.floor(path.length / 2) + 1);
  let i = 0;
  if (odd) {
    out[0] = (flag << 4) | path[0];
    i = 1;
  } else {
    out[0] = flag << 4;
  }
  for (let o = 1; i < path.length; i += 2, o++) out[o] = (path[i] << 4) | path[i + 1];
  return out;
};

const commonPrefix = (entries: Entry[], depth: number): number => {
  const first = entries[0].nibbles;
  let len = 0;
  for (;;) {
    const at = depth + len;
    if (at >= first.length) return len;
    const n = first[at];
    if (entries.some((e) => at >= e.nibbles.length || e.nibbles[at] !== n)) return len;
    len++;
  }
};

const build = (entries: Entry[], depth: number): TrieNode => {
  if (entries.length === 1) {
    return { kind: "leaf", path: entries[0].nibbles.slice(depth), value: entries[0].value };
  }
  const shared = commonPrefix(entries, depth);
  if (shared > 0) {
    return {
      kind: "extension",
      path: entries[0].nibbles.slice(depth, depth + shared),
      child: build(entries, depth + shared),
    };
  }
  const children: (TrieNode | undefined)[] = [];
  for (let n = 0; n < 16; n++) {
    const group = entries.filter((e) => e.nibbles.length > depth && e.nibbles[depth] === n);
    children.push(group.length > 0 ? build(group, depth + 1) : undefined);
  }
  const terminal = entries.find((e) => e.nibbles.length === depth);
  return { kind: "branch", children, value: terminal?.value };
};

/* ── node serialisation ──────────────────────────────────── */
const raw = (node: TrieNode): RlpItem => {
  switch (node.kind) {
    case "leaf":
      return [hexPrefix(node.path, true), node.value];
    case "extension":
      return [hexPrefix(node.path, false), ref(node.child)];
    case "branch":
      return [
        ...node.children.map((c) => (c ? ref(c) : new Uint8Array())),
        node.value ?? new Uint8Array(),
      ];
  }
};

// Nodes shorter than 32 bytes are embedded in their parent, others by hash.
const ref = (node: TrieNode): RlpItem => {
  const encoded = encodeItem(raw(node));
  return encoded.length < 32 ? raw(node) : keccak(encoded);
};

/**
 * In-memory Merkle-Patricia trie. Rebuilt from its entries on every root or
 * proof request; keys are used as given (callers hash them for a secure trie).
 */
export class MerklePatriciaTrie {
  private readonly entries = new Map<string, { key: Uint8Array; value: Uint8Array }>();

  static from(pairs: Iterable<readonly [Uint8Array, Uint8Array]>): MerklePatriciaTrie {
    const trie = new MerklePatriciaTrie();
    for (const [key, value] of pairs) trie.put(key, value);
    return trie;
  }

  get size(): number {
    return this.entries.size;
  }

  put(key: Uint8Array, value: Uint8Array): this {
    if (value.length === 0) {
      this.entries.delete(bytesToHex(key));
    } else {
      this.entries.set(bytesToHex(key), { key, value });
    }
    return this;
  }

  get(key: Uint8Array): Uint8Array | undefined {
    return this.entries.get(bytesToHex(key))?.value;
  }

  root(): Hex {
    const node = this.tree();
    return node ? bytesToHex(keccak(encodeItem(raw(node)))) : EMPTY_TRIE_ROOT;
  }

  /**
   * RLP-encoded nodes from the root down to the key's leaf. Embedded nodes
   * travel inside their parent and are not listed separately.
   */
  prove(key: Uint8Array): Uint8Array[] {
    const root = this.tree();
    if (!root || !this.entries.has(bytesToHex(key))) {
      throw new Error(`key ${bytesToHex(key)} is not in the trie`);
    }
    let node: TrieNode = root;
    const path = toNibbles(key);
    const proof: Uint8Array[] = [];
    let depth = 0;
    let hashed = true;
    for (;;) {
      const encoded = encodeItem(raw(node));
      if (hashed) proof.push(encoded);
      let next: TrieNode | undefined;
      switch (node.kind) {
        case "leaf":
          return proof;
        case "extension":
          depth += node.path.length;
          next = node.child;
          break;
        case "branch":
          if (depth === path.length) return proof;
          next = node.children[path[depth]];
          depth += 1;
          break;
      }
      if (!next) throw new Error("trie is inconsistent with its entries");
      hashed = encodeItem(raw(next)).length >= 32;
      node = next;
    }
  }

  private tree(): TrieNode | undefined {
    if (this.entries.size === 0) return undefined;
    const entries = [...this.entries.values()].map(({ key, value }) => ({
      nibbles: toNibbles(key),
      value,
    }));
    return build(entries, 0);
  }
}
