/**
 * Rendering option schemas, defaults and loaders.
 *
 * Usage:
 *   import { loadTagOptions } from "./config/markup/index.js";
 *
 *   const options = loadTagOptions({ shortenEmptyTag: false });
 */

export type {
  TagOptions,
  TagOptionsInput,
  XmlPrologOptions,
  XmlPrologOptionsInput,
} from "./schema.js";

export { TagOptionsSchema, XmlPrologOptionsSchema } from "./schema.js";

export {
  loadTagOptions,
  loadXmlPrologOptions,
  MarkupOptionsError,
  type OptionValidationIssue,
} from "./loader.js";

export {
  DEFAULT_TAG_OPTIONS,
  DEFAULT_XML_PROLOG,
  XHTML_NAMESPACE,
  XHTML1_STRICT_DOCTYPE,
} from "./defaults.js";
