import type { Address, Hex } from "../types";
import { ensure, fail } from "./errors";
import type { MessageRegistry, MessageStatus, Registered } from "./types";
import { isTerminal } from "./messageBox";

export const emptyRegistry = <R extends Registered>(): MessageRegistry<R> => ({
  records: new Map(),
  active: new Map(),
});

/** 0 for a fresh account, otherwise one past the nonce of its latest message. */
export const getNonce = <R extends Registered>(
  registry: MessageRegistry<R>,
  account: Address,
): bigint => {
  const hash = registry.active.get(account);
  if (!hash) return 0n;
  const record = registry.records.get(hash);
  if (!record) return fail("sequencing", "Active process has no record.");
  return record.message.nonce + 1n;
};

export const getRecord = <R extends Registered>(
  registry: MessageRegistry<R>,
  messageHash: Hex,
): R => {
  const record = registry.records.get(messageHash);
  if (!record) return fail("status", "Message is not registered.");
  return record;
};

/**
 * Registers `record` as the account's new in-flight message. The previous one
 * must be Progressed or Revoked; its record is dropped only after the new
 * record and the active pointer are in place.
 */
export const initiateNewProcess = <R extends Registered>(
  registry: MessageRegistry<R>,
  account: Address,
  nonce: bigint,
  messageHash: Hex,
  record: R,
  statusOf: (messageHash: Hex) => MessageStatus,
): MessageRegistry<R> => {
  ensure(nonce === getNonce(registry, account), "sequencing", "Invalid nonce.");
  ensure(!registry.records.has(messageHash), "sequencing", "Message is already registered.");

  const previous = registry.active.get(account);
  if (previous) {
    ensure(isTerminal(statusOf(previous)), "sequencing", "Previous process is not completed.");
  }

  const records = new Map(registry.records).set(messageHash, record);
  const active = new Map(registry.active).set(account, messageHash);
  if (previous) records.delete(previous);
  return { records, active };
};

export const updateRecord = <R extends Registered>(
  registry: MessageRegistry<R>,
  messageHash: Hex,
  update: (record: R) => R,
): MessageRegistry<R> => {
  const record = getRecord(registry, messageHash);
  return { ...registry, records: new Map(registry.records).set(messageHash, update(record)) };
};
