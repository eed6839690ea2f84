import { keccak_256 as keccak } from "@noble/hashes/sha3";
import { bytesToHex, hexToBytes, keccak256 } from "viem";
import { encodeAccount, encodeParentNodes, type AccountRecord } from "../codec/rlp";
import { toAddress } from "../core/address";
import { isProtocolError } from "../core/errors";
import { DEFAULT_GAS_SCHEDULE, GasMeter, type GasSchedule } from "../core/gas";
import type { CallContext } from "../gateway/types";
import { makeLogger, type ILogger } from "../logging";
import { MerklePatriciaTrie } from "../trie/trie";
import type { Address, Hex, Transition } from "../types";
import { Anchor } from "./anchor";

/** keccak of empty code */
const EMPTY_CODE_HASH = keccak256("0x");

export type Reducer<S, C, E> = (state: S, cmd: C, ctx: CallContext) => Transition<S, E>;

/** Contract accounts of a world state with their raw storage slots. */
export type AccountView<S> = (state: S) => Map<Address, Array<[Hex, Uint8Array]>>;

export interface BlockHeader {
  height: bigint;
  stateRoot: Hex;
}

export interface Receipt<E> {
  event: E;
  gasUsed: bigint;
}

export interface AccountProof {
  rlpAccount: Hex;
  rlpParentNodes: Hex;
  storageRoot: Hex;
}

interface Block {
  header: BlockHeader;
  stateTrie: MerklePatriciaTrie;
  accounts: Map<string, { record: AccountRecord; storage: MerklePatriciaTrie }>;
}

export interface ChainRuntimeOptions<S, C, E> {
  name: string;
  genesis: S;
  reduce: Reducer<S, C, E>;
  accounts: AccountView<S>;
  /** holds the counterpart chain's state roots */
  anchor?: Anchor;
  gas?: GasSchedule;
  logger?: ILogger;
}

const secureKey = (hex: Hex): Uint8Array => keccak(hexToBytes(hex));

/* ──────────── runtime shell ──────────── */

/**
 * One simulated chain: applies commands atomically against an immutable world
 * state and commits it into a state trie on `mine()`, keeping every block so
 * proofs can be produced for any mined height.
 */
export class ChainRuntime<S, C extends { type: string }, E extends { type: string }> {
  readonly name: string;
  readonly anchor: Anchor;
  private current: S;
  private readonly reduce: Reducer<S, C, E>;
  private readonly view: AccountView<S>;
  private readonly schedule: GasSchedule;
  private readonly log: ILogger;
  private readonly blocks = new Map<bigint, Block>();
  private height = 0n;

  constructor(opts: ChainRuntimeOptions<S, C, E>) {
    this.name = opts.name;
    this.current = opts.genesis;
    this.reduce = opts.reduce;
    this.view = opts.accounts;
    this.anchor = opts.anchor ?? new Anchor();
    this.schedule = opts.gas ?? DEFAULT_GAS_SCHEDULE;
    this.log = (opts.logger ?? makeLogger()).child({ chain: opts.name });
  }

  get state(): S {
    return this.current;
  }

  get latest(): BlockHeader | undefined {
    return this.blocks.get(this.height)?.header;
  }

  /** Runs one command; on failure the world state stays as it was. */
  submit(sender: Address, cmd: C): Receipt<E> {
    const gas = new GasMeter(this.schedule);
    try {
      const ctx: CallContext = { sender: toAddress(sender, "Sender"), gas, anchor: this.anchor };
      const { state, event } = this.reduce(this.current, cmd, ctx);
      this.current = state;
      this.log.debug({ cmd: cmd.type, sender, event: event.type, gasUsed: gas.used() }, "applied");
      return { event, gasUsed: gas.used() };
    } catch (e) {
      this.log.warn(
        {
          cmd: cmd.type,
          sender,
          kind: isProtocolError(e) ? e.kind : undefined,
          err: e instanceof Error ? e.message : String(e),
        },
        "rejected",
      );
      throw e;
    }
  }

  /** Commits the current world state as the next block. */
  mine(): BlockHeader {
    const stateTrie = new MerklePatriciaTrie();
    const accounts: Block["accounts"] = new Map();
    for (const [address, slots] of this.view(this.current)) {
      const storage = MerklePatriciaTrie.from(
        slots.map(([slotKey, value]) => [secureKey(slotKey), value] as const),
      );
      const record: AccountRecord = {
        nonce: 0n,
        balance: 0n,
        storageRoot: storage.root(),
        codeHash: EMPTY_CODE_HASH,
      };
      stateTrie.put(secureKey(address), encodeAccount(record));
      accounts.set(address.toLowerCase(), { record, storage });
    }

    this.height += 1n;
    const header: BlockHeader = { height: this.height, stateRoot: stateTrie.root() };
    this.blocks.set(this.height, { header, stateTrie, accounts });
    this.log.info({ height: header.height, root: header.stateRoot }, "commit");
    return header;
  }

  header(height: bigint): BlockHeader | undefined {
    return this.blocks.get(height)?.header;
  }

  proveAccount(address: Address, height: bigint): AccountProof {
    const { block, account } = this.lookup(address, height);
    return {
      rlpAccount: bytesToHex(encodeAccount(account.record)),
      rlpParentNodes: encodeParentNodes(block.stateTrie.prove(secureKey(address))),
      storageRoot: account.record.storageRoot,
    };
  }

  proveStorage(address: Address, slotKey: Hex, height: bigint): Hex {
    const { account } = this.lookup(address, height);
    return encodeParentNodes(account.storage.prove(secureKey(slotKey)));
  }

  private lookup(address: Address, height: bigint) {
    const block = this.blocks.get(height);
    if (!block) throw new Error(`${this.name}: no block at height ${height}`);
    const account = block.accounts.get(address.toLowerCase());
    if (!account) throw new Error(`${this.name}: no account ${address} at height ${height}`);
    return { block, account };
  }
}
