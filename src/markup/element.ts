/**
 * Elements: a tag applied to children and attributes.
 *
 * Elements are immutable and serialize lazily. Iterating an element yields
 * its output in small fragments:
 *
 *   "<meta", ' content="text/html"', ' http-equiv="Content-Type"', " />"
 *
 * Nothing is rendered up front. Generator children are advanced only when
 * the fragment they contribute is requested, so documents of any size (or
 * without an end) can be streamed.
 */

import { describeType, ConstructionError } from "./errors.js";
import { escapeMarkup } from "./escape.js";
import { isIterator, renderChildren } from "./flatten.js";
import { Markup } from "./raw-string.js";
import { Tag } from "./tag.js";

export type AttributeValue = string | number | bigint | boolean | null | undefined;

export type Attributes = { readonly [name: string]: AttributeValue };

export type Child =
  | string
  | number
  | bigint
  | boolean
  | Markup
  | null
  | undefined
  | Iterable<Child>
  | Iterator<Child>;

/** Positional argument of a tag application: a child or an attribute map. */
export type ElementArg = Child | Attributes;

/**
 * Plain object arguments are attribute maps. Tags, Markup, arrays, other
 * class instances and iterator objects never are.
 */
export function isAttributeMap(value: unknown): value is Attributes {
  if (typeof value !== "object" || value === null || isIterator(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Strip leading and trailing underscores, then turn the remaining ones into
 * hyphens: `class_` → `class`, `http_equiv` → `http-equiv`.
 */
export function normalizeAttributeName(name: string): string {
  return name.replace(/^_+|_+$/g, "").replace(/_/g, "-");
}

function buildAttributes(maps: readonly Attributes[]): Readonly<Record<string, AttributeValue>> {
  // Own data properties only; assigning onto an object would route a
  // "__proto__" key through the prototype setter.
  const merged = new Map<string, AttributeValue>();
  for (const map of maps) {
    for (const [name, value] of Object.entries(map)) {
      merged.set(name, value);
    }
  }

  const entries: [string, AttributeValue][] = [];
  for (const [name, value] of merged) {
    if (value !== null && value !== undefined) {
      entries.push([normalizeAttributeName(name), value]);
    }
  }
  return Object.freeze(Object.fromEntries(entries));
}

export class Element extends Markup {
  readonly tag: Tag;
  readonly children: readonly unknown[];
  readonly attributes: Readonly<Record<string, AttributeValue>>;

  private constructor(
    tag: Tag,
    children: readonly unknown[],
    attributes: Readonly<Record<string, AttributeValue>>
  ) {
    super();
    this.tag = tag;
    this.children = children;
    this.attributes = attributes;
    Object.freeze(this);
  }

  /**
   * Build an element from loose arguments. Attribute maps may appear
   * anywhere and are merged left to right; of the remaining arguments the
   * first must be the Tag and the rest are children.
   *
   * @throws ConstructionError when no Tag is given or the first
   *   non-map argument is not a Tag
   */
  static of(...args: readonly unknown[]): Element {
    const maps: Attributes[] = [];
    const rest: unknown[] = [];
    for (const arg of args) {
      if (isAttributeMap(arg)) {
        maps.push(arg);
      } else {
        rest.push(arg);
      }
    }

    if (rest.length === 0) {
      throw new ConstructionError("missing_tag", "missing tag");
    }
    const [tag, ...children] = rest;
    if (!(tag instanceof Tag)) {
      throw new ConstructionError("expected_tag", `expected Tag, got ${describeType(tag)}`);
    }

    return new Element(tag, Object.freeze(children), buildAttributes(maps));
  }

  /** Whether the element was given any children, null markers included. */
  get hasChildren(): boolean {
    return this.children.length > 0;
  }

  *[Symbol.iterator](): Generator<string, void, undefined> {
    const { name, options } = this.tag;

    yield `<${name}`;

    for (const attr of Object.keys(this.attributes).sort()) {
      yield ` ${attr}="${escapeMarkup(String(this.attributes[attr]))}"`;
    }

    if (this.hasChildren) {
      yield ">";
      yield* renderChildren(this.children, { cdataSection: options.cdataSection });
      yield `</${name}>`;
    } else if (options.shortenEmptyTag) {
      yield " />";
    } else {
      yield `></${name}>`;
    }
  }
}
