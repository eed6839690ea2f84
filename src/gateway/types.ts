import type { StateRootProvider } from "../chain/anchor";
import type { Ledger } from "../chain/ledger";
import type { GasMeter } from "../core/gas";
import type {
  GatewayLink,
  MessageBox,
  MessageRegistry,
  MessageStatus,
  Mint,
  Redeem,
  Stake,
  Unstake,
} from "../core/types";
import type { Address, Hex } from "../types";

/* ── call context ────────────────────────────────────────── */
export interface CallContext {
  readonly sender: Address;
  readonly gas: GasMeter;
  /** state roots of the counterpart chain */
  readonly anchor: StateRootProvider;
}

/* ── endpoint state ──────────────────────────────────────── */
export type Role = "origin" | "auxiliary";

export interface TokenMetadata {
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
}

export interface EndpointState {
  readonly role: Role;
  readonly address: Address;
  /** the counterpart endpoint on the other chain */
  readonly remote: Address;
  readonly organization: Address;
  readonly burner: Address;
  readonly bounty: bigint;
  /** value token on origin, mirrored by the utility token */
  readonly valueToken: Address;
  readonly metadata: TokenMetadata;
  readonly linked: boolean;
  readonly link?: GatewayLink;
  readonly box: MessageBox;
  readonly storageRoots: ReadonlyMap<bigint, Hex>;
}

export interface GatewayState extends EndpointState {
  readonly role: "origin";
  readonly activated: boolean;
  readonly baseToken: Address;
  readonly stakeVault: Address;
  readonly stakes: MessageRegistry<Stake>;
  readonly unstakes: MessageRegistry<Unstake>;
}

export interface CoGatewayState extends EndpointState {
  readonly role: "auxiliary";
  readonly utilityToken: Address;
  readonly mints: MessageRegistry<Mint>;
  readonly redeems: MessageRegistry<Redeem>;
}

/* ── chain worlds ────────────────────────────────────────── */
export interface OriginState {
  readonly gateway: GatewayState;
  readonly valueToken: Ledger;
  readonly baseToken: Ledger;
}

export interface AuxiliaryState {
  readonly coGateway: CoGatewayState;
  readonly utilityToken: Ledger;
  readonly baseCoin: Ledger;
}

/* ── shared command payloads ─────────────────────────────── */
export interface ProveGatewayArgs {
  blockHeight: bigint;
  rlpAccount: Hex;
  rlpParentNodes: Hex;
}

export interface SecretArgs {
  messageHash: Hex;
  unlockSecret: Hex;
}

export interface ProofProgressArgs {
  messageHash: Hex;
  rlpParentNodes: Hex;
  blockHeight: bigint;
  messageStatus: MessageStatus;
}

export interface RevocationProofArgs {
  messageHash: Hex;
  blockHeight: bigint;
  rlpParentNodes: Hex;
}

export interface TransferIntentArgs {
  amount: bigint;
  beneficiary: Address;
  gasPrice: bigint;
  gasLimit: bigint;
  nonce: bigint;
  hashLock: Hex;
}

export interface ConfirmIntentArgs {
  sender: Address;
  nonce: bigint;
  beneficiary: Address;
  amount: bigint;
  gasPrice: bigint;
  gasLimit: bigint;
  hashLock: Hex;
  blockHeight: bigint;
  rlpParentNodes: Hex;
}

export interface InitiateLinkArgs {
  nonce: bigint;
  hashLock: Hex;
}

export interface ConfirmLinkArgs {
  nonce: bigint;
  sender: Address;
  hashLock: Hex;
  blockHeight: bigint;
  rlpParentNodes: Hex;
}

/* ── commands ────────────────────────────────────────────── */
export type OriginCommand =
  | ({ type: "initiateGatewayLink" } & InitiateLinkArgs)
  | ({ type: "progressGatewayLink" } & SecretArgs)
  | ({ type: "progressGatewayLinkWithProof" } & ProofProgressArgs)
  | { type: "activateGateway" }
  | { type: "deactivateGateway" }
  | ({ type: "proveGateway" } & ProveGatewayArgs)
  | ({ type: "stake" } & TransferIntentArgs)
  | ({ type: "progressStake" } & SecretArgs)
  | ({ type: "progressStakeWithProof" } & ProofProgressArgs)
  | { type: "revertStake"; messageHash: Hex }
  | ({ type: "progressRevertStake" } & RevocationProofArgs)
  | ({ type: "confirmRedeemIntent" } & ConfirmIntentArgs)
  | ({ type: "progressUnstake" } & SecretArgs)
  | ({ type: "progressUnstakeWithProof" } & ProofProgressArgs)
  | ({ type: "confirmRevertRedeemIntent" } & RevocationProofArgs);

export type AuxiliaryCommand =
  | ({ type: "confirmGatewayLinkIntent" } & ConfirmLinkArgs)
  | ({ type: "progressGatewayLink" } & SecretArgs)
  | ({ type: "progressGatewayLinkWithProof" } & ProofProgressArgs)
  | ({ type: "proveGateway" } & ProveGatewayArgs)
  | ({ type: "confirmStakeIntent" } & ConfirmIntentArgs)
  | ({ type: "progressMint" } & SecretArgs)
  | ({ type: "progressMintWithProof" } & ProofProgressArgs)
  | ({ type: "confirmRevertStakeIntent" } & RevocationProofArgs)
  | ({ type: "redeem" } & TransferIntentArgs)
  | ({ type: "progressRedeem" } & SecretArgs)
  | ({ type: "progressRedeemWithProof" } & ProofProgressArgs)
  | { type: "revertRedemption"; messageHash: Hex }
  | ({ type: "progressRevertRedemption" } & RevocationProofArgs);

/* ── events ──────────────────────────────────────────────── */
export type EndpointEvent =
  | {
      type: "GatewayProven";
      gateway: Address;
      blockHeight: bigint;
      storageRoot: Hex;
      wasAlreadyProved: boolean;
    }
  | { type: "GatewayLinkDeclared"; messageHash: Hex; gateway: Address; coGateway: Address }
  | { type: "GatewayLinkConfirmed"; messageHash: Hex; gateway: Address; coGateway: Address }
  | { type: "GatewayLinkProgressed"; messageHash: Hex; proofProgress: boolean; unlockSecret: Hex };

export type OriginEvent =
  | EndpointEvent
  | { type: "GatewayActivationChanged"; activated: boolean }
  | {
      type: "StakeIntentDeclared";
      messageHash: Hex;
      staker: Address;
      stakerNonce: bigint;
      beneficiary: Address;
      amount: bigint;
    }
  | {
      type: "StakeProgressed";
      messageHash: Hex;
      staker: Address;
      stakerNonce: bigint;
      amount: bigint;
      proofProgress: boolean;
      unlockSecret: Hex;
    }
  | {
      type: "RevertStakeIntentDeclared";
      messageHash: Hex;
      staker: Address;
      stakerNonce: bigint;
      amount: bigint;
    }
  | { type: "StakeReverted"; messageHash: Hex; staker: Address; stakerNonce: bigint; amount: bigint }
  | {
      type: "RedeemIntentConfirmed";
      messageHash: Hex;
      redeemer: Address;
      redeemerNonce: bigint;
      beneficiary: Address;
      amount: bigint;
      blockHeight: bigint;
      hashLock: Hex;
    }
  | {
      type: "UnstakeProgressed";
      messageHash: Hex;
      redeemer: Address;
      beneficiary: Address;
      redeemAmount: bigint;
      unstakeAmount: bigint;
      rewardAmount: bigint;
      proofProgress: boolean;
      unlockSecret: Hex;
    }
  | {
      type: "RevertRedeemIntentConfirmed";
      messageHash: Hex;
      redeemer: Address;
      redeemerNonce: bigint;
      amount: bigint;
    };

export type AuxiliaryEvent =
  | EndpointEvent
  | {
      type: "StakeIntentConfirmed";
      messageHash: Hex;
      staker: Address;
      stakerNonce: bigint;
      beneficiary: Address;
      amount: bigint;
      blockHeight: bigint;
      hashLock: Hex;
    }
  | {
      type: "MintProgressed";
      messageHash: Hex;
      staker: Address;
      beneficiary: Address;
      stakeAmount: bigint;
      mintedAmount: bigint;
      rewardAmount: bigint;
      proofProgress: boolean;
      unlockSecret: Hex;
    }
  | {
      type: "RevertStakeIntentConfirmed";
      messageHash: Hex;
      staker: Address;
      stakerNonce: bigint;
      amount: bigint;
    }
  | {
      type: "RedeemIntentDeclared";
      messageHash: Hex;
      redeemer: Address;
      redeemerNonce: bigint;
      beneficiary: Address;
      amount: bigint;
    }
  | {
      type: "RedeemProgressed";
      messageHash: Hex;
      redeemer: Address;
      redeemerNonce: bigint;
      amount: bigint;
      proofProgress: boolean;
      unlockSecret: Hex;
    }
  | {
      type: "RevertRedeemDeclared";
      messageHash: Hex;
      redeemer: Address;
      redeemerNonce: bigint;
      amount: bigint;
    }
  | {
      type: "RedeemReverted";
      messageHash: Hex;
      redeemer: Address;
      redeemerNonce: bigint;
      amount: bigint;
    };
