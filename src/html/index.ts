/**
 * Predefined HTML tags.
 */

export {
  HtmlTagRegistry,
  htmlTags,
  loadTagTable,
  canonicalTagName,
  UnknownTagError,
  TagTableError,
  type TagTableIssue,
} from "./registry.js";
export { TagTableSchema, TagNameSchema, type TagTable } from "./schema.js";
export { xhtml, xhtmlDocument } from "./xhtml.js";
