/**
 * XML document helpers.
 */

export { xmlDocument, formatXmlProlog } from "./document.js";
