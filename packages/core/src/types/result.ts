/**
 * Result<T, E> for operations whose failure is an expected outcome
 * (config loading, file parsing) rather than an exceptional one.
 */

export type Result<T, E> = Ok<T> | Err<E>;

export class Ok<T> {
  readonly _tag = 'Ok' as const;

  constructor(public readonly value: T) {}

  isOk(): this is Ok<T> {
    return true;
  }

  isErr(): this is never {
    return false;
  }

  unwrap(): T {
    return this.value;
  }
}

export class Err<E> {
  readonly _tag = 'Err' as const;

  constructor(public readonly error: E) {}

  isOk(): this is never {
    return false;
  }

  isErr(): this is Err<E> {
    return true;
  }

  /** Throws the wrapped error when it is an Error, a wrapper otherwise. */
  unwrap(): never {
    if (this.error instanceof Error) throw this.error;
    throw new Error(`Called unwrap on an Err value: ${String(this.error)}`);
  }
}

export function ok<T>(value: T): Ok<T> {
  return new Ok(value);
}

export function err<E>(error: E): Err<E> {
  return new Err(error);
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.isOk();
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result.isErr();
}
