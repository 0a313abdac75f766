/**
 * Series<A> - an infinite, lazily produced sequence of coefficients
 *
 * A series is a head coefficient and a memoized tail. The head is always
 * known; the tail is computed the first time it is read and shared from
 * then on. Only the prefix someone asks for ever exists in memory.
 *
 *   a0 + a1*x + a2*x^2 + ...   ≅   cons(a0, () => cons(a1, () => ...))
 */

import { Knot, Lazy } from "./lazy.js";

/** A suspended tail: a Lazy cell or a plain function to wrap in one */
export type TailThunk<A> = Lazy<Series<A>> | (() => Series<A>);

export class Series<A> {
  private readonly rest: Lazy<Series<A>>;

  constructor(
    readonly head: A,
    rest: TailThunk<A>
  ) {
    this.rest = rest instanceof Lazy ? rest : Lazy.from(rest);
  }

  /**
   * The series shifted left by one coefficient. Computed once.
   */
  get tail(): Series<A> {
    return this.rest.force();
  }

  /**
   * Whether the tail has been computed yet.
   */
  get isTailEvaluated(): boolean {
    return this.rest.isEvaluated;
  }
}

export function cons<A>(head: A, tail: TailThunk<A>): Series<A> {
  return new Series(head, tail);
}

export function head<A>(s: Series<A>): A {
  return s.head;
}

export function tail<A>(s: Series<A>): Series<A> {
  return s.tail;
}

/**
 * The series with its first n coefficients removed.
 *
 * @throws RangeError for a negative or non-integer n
 */
export function drop<A>(n: number, s: Series<A>): Series<A> {
  assertIndex(n, "drop");
  let current = s;
  for (let i = 0; i < n; i++) {
    current = current.tail;
  }
  return current;
}

/**
 * The coefficient of x^n.
 *
 * @throws RangeError for a negative or non-integer n
 */
export function coefficient<A>(n: number, s: Series<A>): A {
  assertIndex(n, "coefficient");
  return drop(n, s).head;
}

function assertIndex(n: number, op: string): void {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new RangeError(`${op}: index must be a non-negative integer, got ${n}`);
  }
}

/**
 * Build a series whose definition refers to itself.
 *
 * `define` receives a lazy reference to the series being built. It may
 * capture that reference anywhere, but must not force it; forcing happens
 * later, when someone reads a tail.
 *
 * @example
 * ```typescript
 * // exp = 1 + ∫exp
 * const exp = fix("exp", (self) => add(one(R), integralOf(self, R), R));
 * ```
 *
 * @throws ConstructionOrderError if `define` forces the reference
 */
export function fix<A>(label: string, define: (self: Lazy<Series<A>>) => Series<A>): Series<A> {
  const knot = new Knot<Series<A>>(label);
  return knot.tie(define(knot.ref));
}
