/**
 * Pre-rendered markup.
 *
 * `Markup` is the common base of everything that produces its own output
 * fragments: raw strings, elements and fragments. Markup values met while
 * flattening children are re-emitted as they are, without escaping.
 */

export abstract class Markup implements Iterable<string> {
  abstract [Symbol.iterator](): Iterator<string>;

  toString(): string {
    let out = "";
    for (const fragment of this) {
      out += fragment;
    }
    return out;
  }
}

/**
 * Raw XML/HTML text. Its fragments are emitted verbatim: no character is
 * escaped.
 *
 *   new RawString('<a href="/">', "home", "</a>").toString()
 *   // '<a href="/">home</a>'
 */
export class RawString extends Markup {
  readonly fragments: readonly string[];

  constructor(...fragments: string[]) {
    super();
    this.fragments = Object.freeze(fragments);
  }

  *[Symbol.iterator](): Generator<string, void, undefined> {
    yield* this.fragments;
  }

  override toString(): string {
    return this.fragments.join("");
  }
}

export function isMarkup(value: unknown): value is Markup {
  return value instanceof Markup;
}
