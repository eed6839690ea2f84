import { describe, it, expect } from "vitest";
import { keccak256, zeroHash } from "viem";
import { decodeStorageValue } from "../src/codec/rlp";
import { storageSlotKey } from "../src/core/hash";
import { INBOX_SLOT, OUTBOX_SLOT } from "../src/core/messageBox";
import { MessageStatus } from "../src/core/types";
import { verifyAccount, verifyStorage } from "../src/trie/proof";
import { addr, GATEWAY } from "./helpers/fixtures";
import { expectProtocolError } from "./helpers/errors";
import { remoteEndpoint } from "./helpers/proof";

const H1 = keccak256("0x01");
const H2 = keccak256("0x02");

describe("account proofs", () => {
  const remote = remoteEndpoint(GATEWAY, [
    { slot: OUTBOX_SLOT, messageHash: H1, status: MessageStatus.Declared },
  ]);

  it("resolves the storage root of the proven account", () => {
    expect(
      verifyAccount(remote.rlpAccount, remote.rlpParentNodes, GATEWAY, remote.stateRoot),
    ).toBe(remote.storageRoot);
  });

  it("is deterministic", () => {
    const again = remoteEndpoint(GATEWAY, [
      { slot: OUTBOX_SLOT, messageHash: H1, status: MessageStatus.Declared },
    ]);
    expect(again.stateRoot).toBe(remote.stateRoot);
    expect(again.rlpParentNodes).toBe(remote.rlpParentNodes);
  });

  it("rejects the proof for another address", () => {
    expectProtocolError(
      () => verifyAccount(remote.rlpAccount, remote.rlpParentNodes, addr(0xdead), remote.stateRoot),
      "proof",
    );
  });

  it("rejects an account leaf that differs from the proven one", () => {
    const other = remoteEndpoint(GATEWAY, []);
    expectProtocolError(
      () => verifyAccount(other.rlpAccount, remote.rlpParentNodes, GATEWAY, remote.stateRoot),
      "proof",
      "Account proof does not match the encoded account.",
    );
  });

  it("rejects empty inputs as arguments", () => {
    expectProtocolError(
      () => verifyAccount("0x", remote.rlpParentNodes, GATEWAY, remote.stateRoot),
      "argument",
      "RLP encoded account must not be zero.",
    );
    expectProtocolError(
      () => verifyAccount(remote.rlpAccount, "0x", GATEWAY, remote.stateRoot),
      "argument",
      "RLP parent nodes must not be zero.",
    );
  });
});

describe("storage proofs", () => {
  const remote = remoteEndpoint(GATEWAY, [
    { slot: OUTBOX_SLOT, messageHash: H1, status: MessageStatus.Declared },
    { slot: INBOX_SLOT, messageHash: H2, status: MessageStatus.Revoked },
  ]);

  it("returns the RLP status stored under the mapping slot", () => {
    const outbox = verifyStorage(
      storageSlotKey(OUTBOX_SLOT, H1),
      remote.proveSlot(OUTBOX_SLOT, H1),
      remote.storageRoot,
    );
    const inbox = verifyStorage(
      storageSlotKey(INBOX_SLOT, H2),
      remote.proveSlot(INBOX_SLOT, H2),
      remote.storageRoot,
    );
    expect(decodeStorageValue(outbox)).toBe(1n);
    expect(decodeStorageValue(inbox)).toBe(4n);
  });

  it("binds the slot: the outbox proof does not prove the inbox key", () => {
    expectProtocolError(
      () =>
        verifyStorage(
          storageSlotKey(INBOX_SLOT, H1),
          remote.proveSlot(OUTBOX_SLOT, H1),
          remote.storageRoot,
        ),
      "proof",
    );
  });

  it("rejects the zero root", () => {
    expectProtocolError(
      () =>
        verifyStorage(storageSlotKey(OUTBOX_SLOT, H1), remote.proveSlot(OUTBOX_SLOT, H1), zeroHash),
      "proof",
      "Merkle proof verification failed.",
    );
  });
});
