import { expect } from "vitest";
import { ProtocolError, type ErrorKind } from "../../src/core/errors";

/** Runs `fn` and asserts it failed with a ProtocolError of `kind`. */
export const expectProtocolError = (fn: () => unknown, kind: ErrorKind, message?: string) => {
  let caught: unknown;
  try {
    fn();
  } catch (e) {
    caught = e;
  }
  expect(caught).toBeInstanceOf(ProtocolError);
  expect(caught).toMatchObject(message === undefined ? { kind } : { kind, message });
};
