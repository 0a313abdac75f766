/**
 * Lazy - compute-once cells and placeholders for recursive definitions
 *
 * A Lazy<A> holds either a recipe or the value the recipe produced. The
 * first force() runs the recipe and caches the result; later calls return
 * the cache. A Knot<A> is a Lazy that starts out empty and is bound
 * exactly once, which is how a series gets to mention itself in its own
 * definition.
 *
 * @example
 * ```typescript
 * const k = new Knot<Series<Rational>>("exp");
 * const exp = k.tie(add(one(R), integralOf(k.ref, R), R));
 * ```
 */

import { createLogger } from "@powser/core";
import { ConstructionOrderError } from "./errors.js";

const log = createLogger("lazy");

type LazyState<A> =
  | { readonly tag: "pending"; readonly recipe: () => A }
  | { readonly tag: "evaluating"; readonly recipe: () => A }
  | { readonly tag: "done"; readonly value: A };

export class Lazy<A> {
  private state: LazyState<A>;

  private constructor(state: LazyState<A>) {
    this.state = state;
  }

  /**
   * A cell that is already evaluated.
   */
  static of<A>(value: A): Lazy<A> {
    return new Lazy<A>({ tag: "done", value });
  }

  /**
   * A cell that runs `recipe` on first force.
   */
  static from<A>(recipe: () => A): Lazy<A> {
    return new Lazy<A>({ tag: "pending", recipe });
  }

  get isEvaluated(): boolean {
    return this.state.tag === "done";
  }

  /**
   * Evaluate (once) and return the value.
   *
   * A recipe that throws leaves the cell pending, so the next force runs it again.
   *
   * @throws ConstructionOrderError when called from inside this cell's own recipe
   */
  force(): A {
    const state = this.state;
    switch (state.tag) {
      case "done":
        return state.value;
      case "evaluating":
        throw new ConstructionOrderError(
          "lazy value was forced while it was being computed; the definition depends on its own result"
        );
      case "pending": {
        this.state = { tag: "evaluating", recipe: state.recipe };
        let value: A;
        try {
          value = state.recipe();
        } catch (err) {
          this.state = state;
          throw err;
        }
        // Dropping the recipe releases whatever its closure held.
        this.state = { tag: "done", value };
        return value;
      }
    }
  }
}

/**
 * Shorthand for Lazy.from.
 */
export function lazy<A>(recipe: () => A): Lazy<A> {
  return Lazy.from(recipe);
}

type KnotState<A> = { readonly tied: false } | { readonly tied: true; readonly value: A };

/**
 * A placeholder for a value that is defined in terms of itself.
 *
 * `ref` can be captured by the defining expression right away; it only
 * has to stay unforced until `tie` has run.
 */
export class Knot<A> {
  private state: KnotState<A> = { tied: false };

  readonly ref: Lazy<A>;

  constructor(readonly label: string) {
    this.ref = Lazy.from(() => {
      const state = this.state;
      if (!state.tied) {
        throw new ConstructionOrderError(
          `placeholder "${label}" was read before its definition was bound`
        );
      }
      return state.value;
    });
  }

  get isTied(): boolean {
    return this.state.tied;
  }

  /**
   * Bind the placeholder and return the value.
   *
   * @throws ConstructionOrderError if the knot is already tied
   */
  tie(value: A): A {
    if (this.state.tied) {
      throw new ConstructionOrderError(`placeholder "${this.label}" was bound twice`);
    }
    this.state = { tied: true, value };
    log.debug(`tied ${this.label}`);
    return value;
  }
}
