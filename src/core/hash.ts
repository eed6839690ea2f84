import {
  encodeAbiParameters,
  keccak256,
  parseAbiParameters,
  stringToHex,
} from "viem";
import type { Address, Hex } from "../types";
import type { Message } from "./types";

/* ── type hashes ─────────────────────────────────────────── */
export const MESSAGE_TYPEHASH = keccak256(
  stringToHex(
    "Message(bytes32 intentHash,uint256 nonce,uint256 gasPrice,uint256 gasLimit,address sender,bytes32 hashLock)",
  ),
);
export const STAKE_TYPEHASH = keccak256(
  stringToHex("StakeIntent(uint256 amount,address beneficiary,address gateway)"),
);
export const REDEEM_TYPEHASH = keccak256(
  stringToHex("RedeemIntent(uint256 amount,address beneficiary,address gateway)"),
);
export const GATEWAY_LINK_TYPEHASH = keccak256(
  stringToHex(
    "GatewayLink(address gateway,address coGateway,uint256 bounty,string tokenName,string tokenSymbol,uint8 tokenDecimals,uint256 nonce,address token)",
  ),
);

/* ── message digest ──────────────────────────────────────── */

/**
 * Public handle of a message on both chains. Besides typeHash, intentHash,
 * nonce and gasPrice it deliberately binds gasLimit, sender and hashLock:
 * every field except gasConsumed, so any relayed field that differs changes
 * the hash.
 */
export const messageDigest = (m: Omit<Message, "gasConsumed">): Hex =>
  keccak256(
    encodeAbiParameters(
      parseAbiParameters("bytes32, bytes32, uint256, uint256, uint256, address, bytes32"),
      [MESSAGE_TYPEHASH, m.intentHash, m.nonce, m.gasPrice, m.gasLimit, m.sender, m.hashLock],
    ),
  );

export const hashStakeIntent = (amount: bigint, beneficiary: Address, gateway: Address): Hex =>
  keccak256(
    encodeAbiParameters(parseAbiParameters("bytes32, uint256, address, address"), [
      STAKE_TYPEHASH,
      amount,
      beneficiary,
      gateway,
    ]),
  );

export const hashRedeemIntent = (amount: bigint, beneficiary: Address, coGateway: Address): Hex =>
  keccak256(
    encodeAbiParameters(parseAbiParameters("bytes32, uint256, address, address"), [
      REDEEM_TYPEHASH,
      amount,
      beneficiary,
      coGateway,
    ]),
  );

export interface LinkTerms {
  gateway: Address;
  coGateway: Address;
  bounty: bigint;
  tokenName: string;
  tokenSymbol: string;
  tokenDecimals: number;
  nonce: bigint;
  token: Address;
}

export const hashLinkIntent = (t: LinkTerms): Hex =>
  keccak256(
    encodeAbiParameters(
      parseAbiParameters(
        "bytes32, address, address, uint256, string, string, uint8, uint256, address",
      ),
      [
        GATEWAY_LINK_TYPEHASH,
        t.gateway,
        t.coGateway,
        t.bounty,
        t.tokenName,
        t.tokenSymbol,
        t.tokenDecimals,
        t.nonce,
        t.token,
      ],
    ),
  );

/* ── hash lock ───────────────────────────────────────────── */
export const hashLockOf = (unlockSecret: Hex): Hex => keccak256(unlockSecret);

/* ── storage layout ──────────────────────────────────────── */

/** Slot key of `mapping(bytes32 => MessageStatus)` entry at `slot`. */
export const storageSlotKey = (slot: bigint, messageHash: Hex): Hex =>
  keccak256(
    encodeAbiParameters(parseAbiParameters("bytes32, uint256"), [messageHash, slot]),
  );
