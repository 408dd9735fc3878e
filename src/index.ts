/**
 * tagstream: lazy HTML/XML markup built from nested tag applications.
 *
 *   import { htmlTags } from "tagstream";
 *
 *   const [ul, li] = htmlTags.pick("ul", "li");
 *   const list = ul(
 *     (function* () {
 *       for (const member of members) {
 *         yield li(member.name, { class_: member.admin ? "admin" : "" });
 *       }
 *     })()
 *   );
 *
 *   String(list);             // whole document
 *   toReadable(list).pipe(res); // streamed, fragment by fragment
 */

export * from "./markup/index.js";
export * from "./html/index.js";
export * from "./xml/index.js";
export {
  ConfigError,
  MarkupOptionsError,
  TagOptionsSchema,
  XmlPrologOptionsSchema,
  loadTagOptions,
  loadXmlPrologOptions,
  XHTML_NAMESPACE,
  XHTML1_STRICT_DOCTYPE,
  type TagOptions,
  type TagOptionsInput,
  type XmlPrologOptions,
  type XmlPrologOptionsInput,
  type OptionValidationIssue,
} from "./config/index.js";
export {
  createLogger,
  getLogger,
  setLogger,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logging/index.js";
