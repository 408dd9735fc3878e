/**
 * Tag descriptors.
 *
 * A Tag is an immutable name plus rendering options. It is shared by every
 * element built from it and holds no per-element state.
 */

import {
  DEFAULT_TAG_OPTIONS,
  loadTagOptions,
  type TagOptions,
  type TagOptionsInput,
} from "../config/markup/index.js";
import { ConstructionError } from "./errors.js";

export class Tag {
  readonly name: string;
  readonly options: Readonly<TagOptions>;

  /**
   * @throws ConstructionError if the name is empty
   * @throws MarkupOptionsError if an option has the wrong type
   */
  constructor(name: string, options?: TagOptionsInput) {
    if (typeof name !== "string" || name === "") {
      throw new ConstructionError("invalid_tag_name", "Tag name must be a non-empty string");
    }
    this.name = name;
    this.options = options === undefined ? DEFAULT_TAG_OPTIONS : loadTagOptions(options);
    Object.freeze(this);
  }

  equals(other: Tag): boolean {
    return this.name === other.name;
  }

  toString(): string {
    return `Tag(${JSON.stringify(this.name)})`;
  }
}
