import { canonicalAddress } from "../core/address";
import { hashLockOf, storageSlotKey } from "../core/hash";
import { INBOX_SLOT, OUTBOX_SLOT } from "../core/messageBox";
import { getNonce } from "../core/registry";
import { MessageStatus } from "../core/types";
import type { AuxiliaryChain, OriginChain } from "../chain/deploy";
import type { Receipt } from "../chain/runtime";
import { makeLogger, type ILogger } from "../logging";
import type { Address, Hex } from "../types";

/** Terms of a transfer as both chains see them. */
export interface TransferRequest {
  messageHash: Hex;
  sender: Address;
  nonce: bigint;
  beneficiary: Address;
  amount: bigint;
  gasPrice: bigint;
  gasLimit: bigint;
  hashLock: Hex;
}

export interface TransferTerms {
  amount: bigint;
  beneficiary: Address;
  gasPrice: bigint;
  gasLimit: bigint;
  /** preimage of the hash lock, kept by the sender */
  unlockSecret: Hex;
}

interface StorageProver {
  proveStorage(address: Address, slotKey: Hex, height: bigint): Hex;
}

const isEvent = <E extends { type: string }, T extends E["type"]>(
  e: E,
  type: T,
): e is Extract<E, { type: T }> => e.type === type;

const eventOf = <E extends { type: string }, T extends E["type"]>(
  receipt: Receipt<E>,
  type: T,
): Extract<E, { type: T }> => {
  const { event } = receipt;
  if (!isEvent(event, type)) throw new Error(`expected ${type}, got ${event.type}`);
  return event;
};

/**
 * Relays proofs and secrets between the two chains. It holds no authority:
 * every step is re-checked by the endpoint it submits to, so a faulty relayer
 * can stall a transfer but never forge one.
 */
export class Facilitator {
  private readonly log: ILogger;

  constructor(
    readonly origin: OriginChain,
    readonly auxiliary: AuxiliaryChain,
    readonly address: Address,
    logger: ILogger = makeLogger(),
  ) {
    this.log = logger.child({ facilitator: address });
  }

  private get gateway(): Address {
    return this.origin.state.gateway.address;
  }

  private get coGateway(): Address {
    return this.auxiliary.state.coGateway.address;
  }

  private slotProof(
    chain: StorageProver,
    endpoint: Address,
    slot: bigint,
    messageHash: Hex,
    height: bigint,
  ): Hex {
    return chain.proveStorage(endpoint, storageSlotKey(slot, messageHash), height);
  }

  /* ── anchoring ─────────────────────────────────────────── */

  /** Mines origin, anchors its state root on auxiliary and proves the gateway there. */
  anchorOrigin(): bigint {
    const header = this.origin.mine();
    this.auxiliary.anchor.anchorStateRoot(header.height, header.stateRoot);
    const proof = this.origin.proveAccount(this.gateway, header.height);
    this.auxiliary.submit(this.address, {
      type: "proveGateway",
      blockHeight: header.height,
      rlpAccount: proof.rlpAccount,
      rlpParentNodes: proof.rlpParentNodes,
    });
    return header.height;
  }

  anchorAuxiliary(): bigint {
    const header = this.auxiliary.mine();
    this.origin.anchor.anchorStateRoot(header.height, header.stateRoot);
    const proof = this.auxiliary.proveAccount(this.coGateway, header.height);
    this.origin.submit(this.address, {
      type: "proveGateway",
      blockHeight: header.height,
      rlpAccount: proof.rlpAccount,
      rlpParentNodes: proof.rlpParentNodes,
    });
    return header.height;
  }

  /* ── linking ───────────────────────────────────────────── */

  /** Runs the whole handshake and activates the gateway. */
  linkGateways(organization: Address, unlockSecret: Hex, nonce = 0n): Hex {
    const hashLock = hashLockOf(unlockSecret);
    const { messageHash } = eventOf(
      this.origin.submit(organization, { type: "initiateGatewayLink", nonce, hashLock }),
      "GatewayLinkDeclared",
    );
    const height = this.anchorOrigin();
    this.auxiliary.submit(this.address, {
      type: "confirmGatewayLinkIntent",
      nonce,
      sender: organization,
      hashLock,
      blockHeight: height,
      rlpParentNodes: this.slotProof(this.origin, this.gateway, OUTBOX_SLOT, messageHash, height),
    });
    this.origin.submit(this.address, { type: "progressGatewayLink", messageHash, unlockSecret });
    this.auxiliary.submit(this.address, { type: "progressGatewayLink", messageHash, unlockSecret });
    this.origin.submit(organization, { type: "activateGateway" });
    this.log.info({ messageHash }, "gateways linked");
    return messageHash;
  }

  /* ── stake and mint ────────────────────────────────────── */
  stake(sender: Address, { unlockSecret, ...t }: TransferTerms): TransferRequest {
    const staker = canonicalAddress(sender);
    const nonce = getNonce(this.origin.state.gateway.stakes, staker);
    const hashLock = hashLockOf(unlockSecret);
    const { messageHash } = eventOf(
      this.origin.submit(staker, {
        type: "stake",
        amount: t.amount,
        beneficiary: t.beneficiary,
        gasPrice: t.gasPrice,
        gasLimit: t.gasLimit,
        nonce,
        hashLock,
      }),
      "StakeIntentDeclared",
    );
    this.log.info({ messageHash, staker, nonce }, "stake declared");
    return { messageHash, sender: staker, nonce, hashLock, ...t };
  }

  confirmStake(r: TransferRequest): bigint {
    const height = this.anchorOrigin();
    this.auxiliary.submit(this.address, {
      type: "confirmStakeIntent",
      sender: r.sender,
      nonce: r.nonce,
      beneficiary: r.beneficiary,
      amount: r.amount,
      gasPrice: r.gasPrice,
      gasLimit: r.gasLimit,
      hashLock: r.hashLock,
      blockHeight: height,
      rlpParentNodes: this.slotProof(this.origin, this.gateway, OUTBOX_SLOT, r.messageHash, height),
    });
    return height;
  }

  /** Fast path: the revealed secret completes both sides. */
  progressStake(r: TransferRequest, unlockSecret: Hex) {
    this.origin.submit(this.address, {
      type: "progressStake",
      messageHash: r.messageHash,
      unlockSecret,
    });
    const { event } = this.auxiliary.submit(this.address, {
      type: "progressMint",
      messageHash: r.messageHash,
      unlockSecret,
    });
    this.log.info({ messageHash: r.messageHash }, "stake progressed");
    return event;
  }

  /** Proof path: mint against the Declared outbox, then settle origin against the Progressed inbox. */
  progressStakeWithProof(r: TransferRequest) {
    const originHeight = this.anchorOrigin();
    const { event } = this.auxiliary.submit(this.address, {
      type: "progressMintWithProof",
      messageHash: r.messageHash,
      rlpParentNodes: this.slotProof(
        this.origin,
        this.gateway,
        OUTBOX_SLOT,
        r.messageHash,
        originHeight,
      ),
      blockHeight: originHeight,
      messageStatus: MessageStatus.Declared,
    });
    const auxHeight = this.anchorAuxiliary();
    this.origin.submit(this.address, {
      type: "progressStakeWithProof",
      messageHash: r.messageHash,
      rlpParentNodes: this.slotProof(
        this.auxiliary,
        this.coGateway,
        INBOX_SLOT,
        r.messageHash,
        auxHeight,
      ),
      blockHeight: auxHeight,
      messageStatus: MessageStatus.Progressed,
    });
    this.log.info({ messageHash: r.messageHash }, "stake progressed with proof");
    return event;
  }

  /** Staker-initiated revert carried through both chains. */
  revertStake(r: TransferRequest): void {
    this.origin.submit(r.sender, { type: "revertStake", messageHash: r.messageHash });
    const originHeight = this.anchorOrigin();
    this.auxiliary.submit(this.address, {
      type: "confirmRevertStakeIntent",
      messageHash: r.messageHash,
      blockHeight: originHeight,
      rlpParentNodes: this.slotProof(
        this.origin,
        this.gateway,
        OUTBOX_SLOT,
        r.messageHash,
        originHeight,
      ),
    });
    const auxHeight = this.anchorAuxiliary();
    this.origin.submit(this.address, {
      type: "progressRevertStake",
      messageHash: r.messageHash,
      blockHeight: auxHeight,
      rlpParentNodes: this.slotProof(
        this.auxiliary,
        this.coGateway,
        INBOX_SLOT,
        r.messageHash,
        auxHeight,
      ),
    });
    this.log.info({ messageHash: r.messageHash }, "stake reverted");
  }

  /* ── redeem and unstake ────────────────────────────────── */
  redeem(sender: Address, { unlockSecret, ...t }: TransferTerms): TransferRequest {
    const redeemer = canonicalAddress(sender);
    const nonce = getNonce(this.auxiliary.state.coGateway.redeems, redeemer);
    const hashLock = hashLockOf(unlockSecret);
    const { messageHash } = eventOf(
      this.auxiliary.submit(redeemer, {
        type: "redeem",
        amount: t.amount,
        beneficiary: t.beneficiary,
        gasPrice: t.gasPrice,
        gasLimit: t.gasLimit,
        nonce,
        hashLock,
      }),
      "RedeemIntentDeclared",
    );
    this.log.info({ messageHash, redeemer, nonce }, "redeem declared");
    return { messageHash, sender: redeemer, nonce, hashLock, ...t };
  }

  confirmRedeem(r: TransferRequest): bigint {
    const height = this.anchorAuxiliary();
    this.origin.submit(this.address, {
      type: "confirmRedeemIntent",
      sender: r.sender,
      nonce: r.nonce,
      beneficiary: r.beneficiary,
      amount: r.amount,
      gasPrice: r.gasPrice,
      gasLimit: r.gasLimit,
      hashLock: r.hashLock,
      blockHeight: height,
      rlpParentNodes: this.slotProof(
        this.auxiliary,
        this.coGateway,
        OUTBOX_SLOT,
        r.messageHash,
        height,
      ),
    });
    return height;
  }

  progressRedeem(r: TransferRequest, unlockSecret: Hex) {
    this.auxiliary.submit(this.address, {
      type: "progressRedeem",
      messageHash: r.messageHash,
      unlockSecret,
    });
    const { event } = this.origin.submit(this.address, {
      type: "progressUnstake",
      messageHash: r.messageHash,
      unlockSecret,
    });
    this.log.info({ messageHash: r.messageHash }, "redeem progressed");
    return event;
  }

  progressRedeemWithProof(r: TransferRequest) {
    const auxHeight = this.anchorAuxiliary();
    const { event } = this.origin.submit(this.address, {
      type: "progressUnstakeWithProof",
      messageHash: r.messageHash,
      rlpParentNodes: this.slotProof(
        this.auxiliary,
        this.coGateway,
        OUTBOX_SLOT,
        r.messageHash,
        auxHeight,
      ),
      blockHeight: auxHeight,
      messageStatus: MessageStatus.Declared,
    });
    const originHeight = this.anchorOrigin();
    this.auxiliary.submit(this.address, {
      type: "progressRedeemWithProof",
      messageHash: r.messageHash,
      rlpParentNodes: this.slotProof(
        this.origin,
        this.gateway,
        INBOX_SLOT,
        r.messageHash,
        originHeight,
      ),
      blockHeight: originHeight,
      messageStatus: MessageStatus.Progressed,
    });
    this.log.info({ messageHash: r.messageHash }, "redeem progressed with proof");
    return event;
  }

  revertRedeem(r: TransferRequest): void {
    this.auxiliary.submit(r.sender, { type: "revertRedemption", messageHash: r.messageHash });
    const auxHeight = this.anchorAuxiliary();
    this.origin.submit(this.address, {
      type: "confirmRevertRedeemIntent",
      messageHash: r.messageHash,
      blockHeight: auxHeight,
      rlpParentNodes: this.slotProof(
        this.auxiliary,
        this.coGateway,
        OUTBOX_SLOT,
        r.messageHash,
        auxHeight,
      ),
    });
    const originHeight = this.anchorOrigin();
    this.auxiliary.submit(this.address, {
      type: "progressRevertRedemption",
      messageHash: r.messageHash,
      blockHeight: originHeight,
      rlpParentNodes: this.slotProof(
        this.origin,
        this.gateway,
        INBOX_SLOT,
        r.messageHash,
        originHeight,
      ),
    });
    this.log.info({ messageHash: r.messageHash }, "redeem reverted");
  }
}
