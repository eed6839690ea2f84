import { describe, it, expect } from "vitest";
import { hashLockOf, storageSlotKey } from "../src/core/hash";
import { INBOX_SLOT, OUTBOX_SLOT, statusOf } from "../src/core/messageBox";
import { MessageStatus } from "../src/core/types";
import {
  CO_GATEWAY,
  FACILITATOR,
  GATEWAY,
  LINK_SECRET,
  ORGANIZATION,
  STAKER,
  deployPair,
  secret,
} from "./helpers/fixtures";
import { expectProtocolError } from "./helpers/errors";

const initiate = (pair: ReturnType<typeof deployPair>) => {
  const { event } = pair.origin.submit(ORGANIZATION, {
    type: "initiateGatewayLink",
    nonce: 0n,
    hashLock: hashLockOf(LINK_SECRET),
  });
  if (event.type !== "GatewayLinkDeclared") throw new Error(`unexpected ${event.type}`);
  return event.messageHash;
};

describe("gateway linking", () => {
  it("links, progresses and activates both endpoints", () => {
    const { origin, auxiliary, facilitator } = deployPair();
    const messageHash = facilitator.linkGateways(ORGANIZATION, LINK_SECRET);

    const g = origin.state.gateway;
    const c = auxiliary.state.coGateway;
    expect(g.linked).toBe(true);
    expect(g.activated).toBe(true);
    expect(c.linked).toBe(true);
    expect(statusOf(g.box, "outbox", messageHash)).toBe(MessageStatus.Progressed);
    expect(statusOf(c.box, "inbox", messageHash)).toBe(MessageStatus.Progressed);
    expect(c.link?.messageHash).toBe(messageHash);
  });

  it("only the organization initiates", () => {
    const { origin } = deployPair();
    expectProtocolError(
      () =>
        origin.submit(STAKER, {
          type: "initiateGatewayLink",
          nonce: 0n,
          hashLock: hashLockOf(LINK_SECRET),
        }),
      "access",
      "Only organization can call.",
    );
  });

  it("is a one-time handshake", () => {
    const pair = deployPair();
    initiate(pair);
    expectProtocolError(() => initiate(pair), "status", "Linking is already initiated.");

    const linked = deployPair();
    linked.facilitator.linkGateways(ORGANIZATION, LINK_SECRET);
    expectProtocolError(() => initiate(linked), "status", "Gateway is already linked.");
  });

  it("progress needs the initiated link and its secret", () => {
    const pair = deployPair();
    expectProtocolError(
      () =>
        pair.auxiliary.submit(FACILITATOR, {
          type: "progressGatewayLink",
          messageHash: secret(5),
          unlockSecret: LINK_SECRET,
        }),
      "status",
      "Linking is not initiated.",
    );

    const messageHash = initiate(pair);
    expectProtocolError(
      () =>
        pair.origin.submit(FACILITATOR, {
          type: "progressGatewayLink",
          messageHash: secret(5),
          unlockSecret: LINK_SECRET,
        }),
      "argument",
      "Invalid message hash.",
    );
    expectProtocolError(
      () =>
        pair.origin.submit(FACILITATOR, {
          type: "progressGatewayLink",
          messageHash,
          unlockSecret: secret(6),
        }),
      "argument",
      "Invalid unlock secret.",
    );
    expect(pair.origin.state.gateway.linked).toBe(false);
  });

  it("confirmation must match the declared terms", () => {
    const pair = deployPair();
    initiate(pair);
    const height = pair.facilitator.anchorOrigin();
    const messageHash = pair.origin.state.gateway.link?.messageHash ?? secret(0);
    expectProtocolError(
      () =>
        pair.auxiliary.submit(FACILITATOR, {
          type: "confirmGatewayLinkIntent",
          nonce: 1n,
          sender: ORGANIZATION,
          hashLock: hashLockOf(LINK_SECRET),
          blockHeight: height,
          rlpParentNodes: pair.origin.proveStorage(
            GATEWAY,
            storageSlotKey(OUTBOX_SLOT, messageHash),
            height,
          ),
        }),
      "proof",
    );
    expect(pair.auxiliary.state.coGateway.link).toBeUndefined();
  });

  it("can be progressed with proofs instead of the secret", () => {
    const pair = deployPair();
    const { origin, auxiliary, facilitator } = pair;
    const messageHash = initiate(pair);
    const originHeight = facilitator.anchorOrigin();
    const outboxProof = origin.proveStorage(
      GATEWAY,
      storageSlotKey(OUTBOX_SLOT, messageHash),
      originHeight,
    );
    auxiliary.submit(FACILITATOR, {
      type: "confirmGatewayLinkIntent",
      nonce: 0n,
      sender: ORGANIZATION,
      hashLock: hashLockOf(LINK_SECRET),
      blockHeight: originHeight,
      rlpParentNodes: outboxProof,
    });
    const { event } = auxiliary.submit(FACILITATOR, {
      type: "progressGatewayLinkWithProof",
      messageHash,
      rlpParentNodes: outboxProof,
      blockHeight: originHeight,
      messageStatus: MessageStatus.Declared,
    });
    expect(event).toMatchObject({ type: "GatewayLinkProgressed", proofProgress: true });

    const auxHeight = facilitator.anchorAuxiliary();
    origin.submit(FACILITATOR, {
      type: "progressGatewayLinkWithProof",
      messageHash,
      rlpParentNodes: auxiliary.proveStorage(
        CO_GATEWAY,
        storageSlotKey(INBOX_SLOT, messageHash),
        auxHeight,
      ),
      blockHeight: auxHeight,
      messageStatus: MessageStatus.Progressed,
    });

    expect(origin.state.gateway.linked).toBe(true);
    expect(auxiliary.state.coGateway.linked).toBe(true);
    expect(origin.state.gateway.activated).toBe(false);
  });
});
