/**
 * XML documents: the `<?xml ...?>` prolog followed by the content.
 *
 *   String(xmlDocument(feed(entry("x"))))
 *   // '<?xml version="1.0" encoding="utf-8"?><feed><entry>x</entry></feed>'
 */

import {
  DEFAULT_XML_PROLOG,
  loadXmlPrologOptions,
  type XmlPrologOptions,
  type XmlPrologOptionsInput,
} from "../config/markup/index.js";
import { escapeMarkup, Fragment, RawString, type Child } from "../markup/index.js";

export function formatXmlProlog(options: XmlPrologOptions): string {
  let prolog = `<?xml version="${escapeMarkup(options.version)}" encoding="${escapeMarkup(options.encoding)}"`;
  if (options.standalone !== undefined) {
    prolog += ` standalone="${options.standalone ? "yes" : "no"}"`;
  }
  return prolog + "?>";
}

/**
 * @throws MarkupOptionsError if the prolog options are invalid
 */
export function xmlDocument(content: Child, options?: XmlPrologOptionsInput): Fragment {
  const prolog = options === undefined ? DEFAULT_XML_PROLOG : loadXmlPrologOptions(options);
  return new Fragment(new RawString(formatXmlProlog(prolog)), content);
}
