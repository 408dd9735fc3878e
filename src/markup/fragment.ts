import { renderChildren } from "./flatten.js";
import { Markup } from "./raw-string.js";

/**
 * A tagless run of children, rendered like element content: text escaped,
 * Markup emitted as-is. Documents use it to put a prolog or doctype in
 * front of the root element.
 */
export class Fragment extends Markup {
  readonly children: readonly unknown[];

  constructor(...children: unknown[]) {
    super();
    this.children = Object.freeze(children);
    Object.freeze(this);
  }

  *[Symbol.iterator](): Generator<string, void, undefined> {
    yield* renderChildren(this.children);
  }
}
