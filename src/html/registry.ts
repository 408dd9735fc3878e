/**
 * Predefined tag registry.
 *
 * The standard HTML element set is kept as data in tags.json and turned
 * into element factories once, when this module loads:
 *
 *   const [div, p, a] = htmlTags.pick("div", "p", "a");
 *
 * Names that clash with reserved words elsewhere may be requested with a
 * trailing underscore ("del_", "object_", "var_").
 */

import { readFileSync } from "node:fs";
import { bindTag, Tag, type TagFunction } from "../markup/index.js";
import { getLogger } from "../logging/index.js";
import { TagTableSchema, type TagTable } from "./schema.js";

export class UnknownTagError extends Error {
  constructor(public readonly tagName: string) {
    super(`Unknown tag: "${tagName}"`);
    this.name = "UnknownTagError";
  }
}

/**
 * Validation error for a tag table.
 */
export class TagTableError extends Error {
  public readonly issues: TagTableIssue[];

  constructor(message: string, issues: TagTableIssue[]) {
    super(message);
    this.name = "TagTableError";
    this.issues = issues;
  }

  format(): string {
    const lines = ["Tag table validation failed:"];
    for (const issue of this.issues) {
      lines.push(`  - ${issue.path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export interface TagTableIssue {
  path: string;
  message: string;
  code: string;
}

/**
 * Validate a raw tag table (object or JSON text).
 *
 * @throws TagTableError if validation fails
 */
export function loadTagTable(input: unknown): TagTable {
  const data: unknown = typeof input === "string" ? JSON.parse(input) : input;

  const result = TagTableSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((i) => ({
      path: i.path.join(".") || "(root)",
      message: i.message,
      code: i.code,
    }));
    throw new TagTableError(`Tag table validation failed: ${issues.length} error(s)`, issues);
  }
  return result.data;
}

/**
 * Resolve an alias such as "del_" to its tag name.
 */
export function canonicalTagName(name: string): string {
  return name.replace(/_+$/, "");
}

export class HtmlTagRegistry {
  private readonly tags: ReadonlyMap<string, TagFunction>;

  constructor(table: TagTable) {
    const tags = new Map<string, TagFunction>();
    for (const name of table.elements) {
      tags.set(name, bindTag(new Tag(name, table.options[name])));
    }
    this.tags = tags;
  }

  /**
   * Load a registry from a JSON table on disk.
   */
  static fromFile(path: string | URL): HtmlTagRegistry {
    const table = loadTagTable(readFileSync(path, "utf-8"));
    getLogger().debug("Tag table loaded", {
      path: String(path),
      tags: table.elements.length,
    });
    return new HtmlTagRegistry(table);
  }

  has(name: string): boolean {
    return this.tags.has(canonicalTagName(name));
  }

  /**
   * @throws UnknownTagError
   */
  get(name: string): TagFunction {
    const tag = this.tags.get(canonicalTagName(name));
    if (tag === undefined) {
      throw new UnknownTagError(name);
    }
    return tag;
  }

  pick(...names: string[]): TagFunction[] {
    return names.map((name) => this.get(name));
  }

  /** Registered tag names, sorted. */
  names(): string[] {
    return [...this.tags.keys()].sort();
  }
}

export const htmlTags: HtmlTagRegistry = HtmlTagRegistry.fromFile(
  new URL("./tags.json", import.meta.url)
);
