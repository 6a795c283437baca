import type { EndOfInput } from './EndOfInput';

export namespace Result {
  export class Ok<T> {
    readonly ok: T;

    constructor(ok: T) {
      this.ok = ok;
    }

    /** Return the value. */
    unwrap(): T {
      return this.ok;
    }

    toString(): string {
      return `Ok(${String(this.ok)})`;
    }
  }

  export class Err<E> {
    readonly err: E;

    constructor(err: E) {
      this.err = err;
    }

    /** Throw the carried error. */
    unwrap(): never {
      throw this.err;
    }

    toString(): string {
      return `Err(${String(this.err)})`;
    }
  }

  /** Apply `fn` to an Ok value; an Err passes through unchanged. */
  export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
    if (result instanceof Err) return result;
    return new Ok(fn(result.ok));
  }
}

/**
 * Outcome of a bounds-checked read. Reads never throw; they return one of these.
 */
export type Result<T, E = EndOfInput> = Result.Ok<T> | Result.Err<E>;
