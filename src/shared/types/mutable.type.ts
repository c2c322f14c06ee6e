/**
 * Strips `readonly` from every property of T, for building values whose
 * public type is immutable.
 */
export type Mutable<T> = {
  -readonly [P in keyof T]: T[P];
};
