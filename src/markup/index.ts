/**
 * Markup core: tags, elements, raw strings and their lazy serialization.
 */

export { Markup, RawString, isMarkup } from "./raw-string.js";
export { Tag } from "./tag.js";
export {
  Element,
  isAttributeMap,
  normalizeAttributeName,
  type AttributeValue,
  type Attributes,
  type Child,
  type ElementArg,
} from "./element.js";
export { Fragment } from "./fragment.js";
export { bindTag, defineTag, type TagFunction } from "./factory.js";
export {
  classifyChild,
  flatten,
  renderChildren,
  type ClassifiedChild,
  type Leaf,
  type LeafRenderOptions,
} from "./flatten.js";
export { escapeMarkup } from "./escape.js";
export {
  ConstructionError,
  RenderError,
  describeType,
  type ConstructionErrorCode,
} from "./errors.js";
export {
  renderToString,
  iterateFragments,
  takeFragments,
  toReadable,
  type ReadableOptions,
} from "./render.js";
