/* ─── Primitives ─── */
export type Hex = `0x${string}`;
export type Address = Hex;

/** Result of one reducer call: the next state plus the event it emitted. */
export interface Transition<S, E> {
  state: S;
  event: E;
}
