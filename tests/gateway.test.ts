import { describe, it, expect } from "vitest";
import { balanceOf, createLedger } from "../src/chain/ledger";
import { hashLockOf, hashStakeIntent, messageDigest } from "../src/core/hash";
import { OUTBOX_SLOT, statusOf } from "../src/core/messageBox";
import { MessageStatus } from "../src/core/types";
import { applyOriginCommand, createGateway } from "../src/gateway/gateway";
import type { OriginCommand, OriginState } from "../src/gateway/types";
import type { Address } from "../src/types";
import {
  BASE_TOKEN,
  BENEFICIARY,
  BOUNTY,
  BURNER,
  CO_GATEWAY,
  FakeStateRoots,
  GATEWAY,
  METADATA,
  ORGANIZATION,
  STAKER,
  STAKE_VAULT,
  TERMS,
  VALUE_TOKEN,
  addr,
  ctxFor,
  secret,
} from "./helpers/fixtures";
import { expectProtocolError } from "./helpers/errors";
import { remoteEndpoint } from "./helpers/proof";

const genesis = (): OriginState =>
  createGateway(
    {
      address: GATEWAY,
      coGateway: CO_GATEWAY,
      organization: ORGANIZATION,
      burner: BURNER,
      stakeVault: STAKE_VAULT,
      bounty: BOUNTY,
      metadata: METADATA,
    },
    createLedger(VALUE_TOKEN, "TV", [[STAKER, 5000n]]),
    createLedger(BASE_TOKEN, "BT", [[STAKER, 100n]]),
  );

const live = (): OriginState => {
  const s = genesis();
  return { ...s, gateway: { ...s.gateway, linked: true, activated: true } };
};

const apply = (s: OriginState, sender: Address, cmd: OriginCommand, anchor = new FakeStateRoots()) =>
  applyOriginCommand(s, cmd, ctxFor(sender, anchor));

type StakeCommand = Extract<OriginCommand, { type: "stake" }>;
type ProveCommand = Extract<OriginCommand, { type: "proveGateway" }>;

const stakeCmd = (nonce = 0n): StakeCommand => ({
  type: "stake",
  ...TERMS,
  beneficiary: BENEFICIARY,
  nonce,
  hashLock: hashLockOf(secret(1)),
});

describe("proveGateway", () => {
  const remote = remoteEndpoint(CO_GATEWAY, []);
  const anchor = new FakeStateRoots();
  anchor.roots.set(3n, remote.stateRoot);
  const cmd: ProveCommand = {
    type: "proveGateway",
    blockHeight: 3n,
    rlpAccount: remote.rlpAccount,
    rlpParentNodes: remote.rlpParentNodes,
  };

  it("stores the counterpart storage root for the height", () => {
    const { state, event } = apply(genesis(), STAKER, cmd, anchor);
    expect(state.gateway.storageRoots.get(3n)).toBe(remote.storageRoot);
    expect(event).toEqual({
      type: "GatewayProven",
      gateway: CO_GATEWAY,
      blockHeight: 3n,
      storageRoot: remote.storageRoot,
      wasAlreadyProved: false,
    });
  });

  it("re-proving the same root is idempotent", () => {
    const first = apply(genesis(), STAKER, cmd, anchor);
    const second = apply(first.state, STAKER, cmd, anchor);
    expect(second.state.gateway).toBe(first.state.gateway);
    expect(second.event).toMatchObject({ wasAlreadyProved: true, storageRoot: remote.storageRoot });
  });

  it("a different root for a proven height fails", () => {
    const first = apply(genesis(), STAKER, cmd, anchor);
    const forked = remoteEndpoint(CO_GATEWAY, [
      { slot: OUTBOX_SLOT, messageHash: secret(9), status: MessageStatus.Declared },
    ]);
    const other = new FakeStateRoots();
    other.roots.set(3n, forked.stateRoot);
    expectProtocolError(
      () =>
        apply(
          first.state,
          STAKER,
          { ...cmd, rlpAccount: forked.rlpAccount, rlpParentNodes: forked.rlpParentNodes },
          other,
        ),
      "proof",
      "Storage root mismatch when account is already proven.",
    );
  });

  it("needs an anchored state root", () => {
    expectProtocolError(
      () => apply(genesis(), STAKER, { ...cmd, blockHeight: 4n }, anchor),
      "anchor",
      "State root must not be zero.",
    );
  });

  it("proves only the counterpart endpoint", () => {
    const stranger = remoteEndpoint(addr(0x4444), []);
    const roots = new FakeStateRoots();
    roots.roots.set(3n, stranger.stateRoot);
    expectProtocolError(
      () =>
        apply(
          genesis(),
          STAKER,
          { ...cmd, rlpAccount: stranger.rlpAccount, rlpParentNodes: stranger.rlpParentNodes },
          roots,
        ),
      "proof",
    );
  });
});

describe("stake", () => {
  it("requires a linked and activated gateway", () => {
    expectProtocolError(() => apply(genesis(), STAKER, stakeCmd()), "access", "Gateway is not linked.");
    const s = genesis();
    const linked = { ...s, gateway: { ...s.gateway, linked: true } };
    expectProtocolError(() => apply(linked, STAKER, stakeCmd()), "access", "Gateway is not activated.");
  });

  it("declares the message and escrows amount and bounty", () => {
    const { state, event } = apply(live(), STAKER, stakeCmd());
    const expectedHash = messageDigest({
      intentHash: hashStakeIntent(1000n, BENEFICIARY, GATEWAY),
      nonce: 0n,
      gasPrice: 2n,
      gasLimit: 100n,
      sender: STAKER,
      hashLock: hashLockOf(secret(1)),
    });
    expect(event).toEqual({
      type: "StakeIntentDeclared",
      messageHash: expectedHash,
      staker: STAKER,
      stakerNonce: 0n,
      beneficiary: BENEFICIARY,
      amount: 1000n,
    });
    expect(statusOf(state.gateway.box, "outbox", expectedHash)).toBe(MessageStatus.Declared);
    expect(balanceOf(state.valueToken, STAKER)).toBe(4000n);
    expect(balanceOf(state.valueToken, GATEWAY)).toBe(1000n);
    expect(balanceOf(state.baseToken, STAKER)).toBe(90n);
    expect(balanceOf(state.baseToken, GATEWAY)).toBe(10n);
  });

  it("requires the amount to cover the maximum reward", () => {
    expectProtocolError(
      () => apply(live(), STAKER, { ...stakeCmd(), amount: 200n }),
      "arithmetic",
      "Maximum possible reward must be less than the stake amount.",
    );
  });

  it("rejects zero amounts and beneficiaries", () => {
    expectProtocolError(() => apply(live(), STAKER, { ...stakeCmd(), amount: 0n }), "argument");
    expectProtocolError(
      () =>
        apply(live(), STAKER, {
          ...stakeCmd(),
          beneficiary: "0x0000000000000000000000000000000000000000",
        }),
      "argument",
    );
  });

  it("enforces nonce order and one stake in flight", () => {
    expectProtocolError(() => apply(live(), STAKER, stakeCmd(1n)), "sequencing", "Invalid nonce.");
    const { state } = apply(live(), STAKER, stakeCmd());
    expectProtocolError(
      () => apply(state, STAKER, stakeCmd(1n)),
      "sequencing",
      "Previous process is not completed.",
    );
  });

  it("fails without enough value tokens and leaves nothing behind", () => {
    const poor = live();
    const s = { ...poor, valueToken: createLedger(VALUE_TOKEN, "TV", [[STAKER, 10n]]) };
    expectProtocolError(() => apply(s, STAKER, stakeCmd()), "arithmetic");
    expect(s.gateway.stakes.records.size).toBe(0);
    expect(s.gateway.box.outbox.size).toBe(0);
  });
});

describe("revertStake", () => {
  it("only the staker may revert, paying the penalty", () => {
    const staked = apply(live(), STAKER, stakeCmd());
    const messageHash = staked.event.type === "StakeIntentDeclared" ? staked.event.messageHash : secret(0);
    expectProtocolError(
      () => apply(staked.state, BENEFICIARY, { type: "revertStake", messageHash }),
      "access",
      "Only staker can revert stake.",
    );
    const { state, event } = apply(staked.state, STAKER, { type: "revertStake", messageHash });
    expect(event).toEqual({
      type: "RevertStakeIntentDeclared",
      messageHash,
      staker: STAKER,
      stakerNonce: 0n,
      amount: 1000n,
    });
    expect(statusOf(state.gateway.box, "outbox", messageHash)).toBe(MessageStatus.DeclaredRevocation);
    expect(balanceOf(state.baseToken, STAKER)).toBe(75n);
    expect(balanceOf(state.baseToken, GATEWAY)).toBe(25n);
  });

  it("a revoked stake cannot be progressed with its secret", () => {
    const staked = apply(live(), STAKER, stakeCmd());
    const messageHash = staked.event.type === "StakeIntentDeclared" ? staked.event.messageHash : secret(0);
    const reverted = apply(staked.state, STAKER, { type: "revertStake", messageHash });
    expectProtocolError(
      () =>
        apply(reverted.state, BENEFICIARY, {
          type: "progressStake",
          messageHash,
          unlockSecret: secret(1),
        }),
      "status",
      "Message on source must be Declared.",
    );
  });
});

describe("activation", () => {
  it("is reserved to the organization of a linked gateway", () => {
    const s = genesis();
    expectProtocolError(() => apply(s, ORGANIZATION, { type: "activateGateway" }), "access", "Gateway is not linked.");
    const linked = { ...s, gateway: { ...s.gateway, linked: true } };
    expectProtocolError(
      () => apply(linked, STAKER, { type: "activateGateway" }),
      "access",
      "Only organization can call.",
    );
    const on = apply(linked, ORGANIZATION, { type: "activateGateway" });
    expect(on.state.gateway.activated).toBe(true);
    expectProtocolError(() => apply(on.state, ORGANIZATION, { type: "activateGateway" }), "status");
    const off = apply(on.state, ORGANIZATION, { type: "deactivateGateway" });
    expect(off.event).toEqual({ type: "GatewayActivationChanged", activated: false });
  });
});

describe("address spelling", () => {
  const mixedCase: Address = `0x${"0".repeat(34)}AbCdEf`;

  it("keys a mixed-case beneficiary on its lowercase form", () => {
    const mixed = apply(live(), STAKER, { ...stakeCmd(), beneficiary: mixedCase });
    const lower = apply(live(), STAKER, { ...stakeCmd(), beneficiary: addr(0xabcdef) });
    expect(mixed.event).toMatchObject({ beneficiary: addr(0xabcdef) });
    expect(mixed.event).toEqual(lower.event);
  });

  it("rejects malformed addresses as argument errors", () => {
    expectProtocolError(
      () => apply(live(), STAKER, { ...stakeCmd(), beneficiary: "0x1234" }),
      "argument",
      "Beneficiary must be a 20-byte address.",
    );
    expectProtocolError(
      () => apply(live(), STAKER, { ...stakeCmd(), beneficiary: `0x${"g".repeat(40)}` }),
      "argument",
      "Beneficiary must be a 20-byte address.",
    );
  });
});
