/**
 * Child flattening.
 *
 * Element children are heterogeneous: text, numbers, Markup, null markers
 * and arbitrarily nested iterables (arrays, sets, generators). Flattening
 * classifies each value into a tagged variant and walks nested iterables
 * depth first, pulling one item at a time, so that a generator child only
 * advances when the consumer asks for its next fragment.
 *
 * Classification:
 *   string                    → text
 *   number, bigint, boolean   → text, via String()
 *   Markup                    → markup leaf (not recursed into)
 *   null, undefined           → skip
 *   other iterable            → sequence (recursed into)
 *   iterator (callable next)  → sequence, drained from its current position
 *   anything else             → RenderError when pulled
 */

import { escapeMarkup } from "./escape.js";
import { describeType, RenderError } from "./errors.js";
import { isMarkup, type Markup } from "./raw-string.js";

export type Leaf =
  | { readonly kind: "text"; readonly text: string }
  | { readonly kind: "markup"; readonly markup: Markup };

export type ClassifiedChild =
  | Leaf
  | { readonly kind: "sequence"; readonly items: Iterable<unknown> }
  | { readonly kind: "skip" };

function isIterable(value: object): value is Iterable<unknown> {
  return typeof Reflect.get(value, Symbol.iterator) === "function";
}

export function isIterator(value: object): value is Iterator<unknown> {
  return typeof Reflect.get(value, "next") === "function";
}

export function classifyChild(value: unknown): ClassifiedChild {
  switch (typeof value) {
    case "string":
      return { kind: "text", text: value };
    case "number":
    case "bigint":
    case "boolean":
      return { kind: "text", text: String(value) };
    case "undefined":
      return { kind: "skip" };
    case "object":
      if (value === null) {
        return { kind: "skip" };
      }
      if (isMarkup(value)) {
        return { kind: "markup", markup: value };
      }
      if (isIterable(value)) {
        return { kind: "sequence", items: value };
      }
      if (isIterator(value)) {
        const iterator = value;
        return { kind: "sequence", items: { [Symbol.iterator]: () => iterator } };
      }
      break;
  }
  throw new RenderError("unsupported_child", describeType(value));
}

/**
 * Lazily flatten children into leaves, in document order.
 */
export function* flatten(children: Iterable<unknown>): Generator<Leaf, void, undefined> {
  for (const child of children) {
    const classified = classifyChild(child);
    switch (classified.kind) {
      case "skip":
        break;
      case "sequence":
        yield* flatten(classified.items);
        break;
      default:
        yield classified;
    }
  }
}

export interface LeafRenderOptions {
  /** Wrap text in CDATA sections instead of escaping it */
  cdataSection?: boolean;
}

/**
 * Lazily render children as output fragments: text is escaped (or wrapped
 * in CDATA), Markup is re-emitted fragment by fragment.
 */
export function* renderChildren(
  children: Iterable<unknown>,
  options: LeafRenderOptions = {}
): Generator<string, void, undefined> {
  for (const leaf of flatten(children)) {
    if (leaf.kind === "markup") {
      yield* leaf.markup;
    } else if (options.cdataSection === true) {
      yield `<![CDATA[${leaf.text}]]>`;
    } else {
      yield escapeMarkup(leaf.text);
    }
  }
}
