/**
 * Failure taxonomy of the message bus. Every precondition violation aborts the
 * whole call; the caller decides whether to resubmit.
 */
export type ErrorKind =
  | "argument" // zero address / hash / amount, empty proof bytes
  | "sequencing" // nonce mismatch, previous process still active
  | "status" // message not in the status the transition needs
  | "proof" // trie decoding failure, root or path mismatch
  | "anchor" // no state root / storage root for the height
  | "arithmetic" // fee above amount, balance or supply underflow
  | "access"; // caller not allowed, endpoint not linked or not active

export class ProtocolError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string) {
    super(message);
    this.name = "ProtocolError";
    this.kind = kind;
  }
}

export function ensure(
  condition: unknown,
  kind: ErrorKind,
  message: string,
): asserts condition {
  if (!condition) throw new ProtocolError(kind, message);
}

export const fail = (kind: ErrorKind, message: string): never => {
  throw new ProtocolError(kind, message);
};

export const isProtocolError = (e: unknown, kind?: ErrorKind): e is ProtocolError =>
  e instanceof ProtocolError && (kind === undefined || e.kind === kind);
