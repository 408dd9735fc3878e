/**
 * Callable tags.
 *
 *   const div = defineTag("div");
 *   const p = defineTag("p");
 *
 *   String(div(p("hi"), { class_: "x" }));
 *   // '<div class="x"><p>hi</p></div>'
 */

import type { TagOptionsInput } from "../config/markup/index.js";
import { Element, type ElementArg } from "./element.js";
import { Tag } from "./tag.js";

export interface TagFunction {
  (...args: ElementArg[]): Element;
  readonly tag: Tag;
}

/**
 * Bind an existing Tag into a callable element factory.
 */
export function bindTag(tag: Tag): TagFunction {
  const apply = (...args: ElementArg[]): Element => Element.of(tag, ...args);
  return Object.assign(apply, { tag });
}

/**
 * Define a new tag and return its element factory.
 */
export function defineTag(name: string, options?: TagOptionsInput): TagFunction {
  return bindTag(new Tag(name, options));
}
