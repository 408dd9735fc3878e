import {
  XHTML_NAMESPACE,
  XHTML1_STRICT_DOCTYPE,
} from "../config/markup/index.js";
import { Fragment, RawString, type Element, type ElementArg } from "../markup/index.js";
import { htmlTags } from "./registry.js";

const html = htmlTags.get("html");

/**
 * The `<html>` root element with the XHTML namespace. An `xmlns` passed by
 * the caller replaces the default.
 */
export function xhtml(...args: ElementArg[]): Element {
  return html({ xmlns: XHTML_NAMESPACE }, ...args);
}

/**
 * An XHTML 1.0 Strict document: doctype followed by the `xhtml()` root.
 */
export function xhtmlDocument(...args: ElementArg[]): Fragment {
  return new Fragment(new RawString(XHTML1_STRICT_DOCTYPE), xhtml(...args));
}
