/**
 * Default rendering options and well-known markup constants.
 */

import type { TagOptions, XmlPrologOptions } from "./schema.js";

const tagOptions: TagOptions = {
  shortenEmptyTag: true,
  cdataSection: false,
};

const xmlProlog: XmlPrologOptions = {
  version: "1.0",
  encoding: "utf-8",
};

export const DEFAULT_TAG_OPTIONS: Readonly<TagOptions> = Object.freeze(tagOptions);

export const DEFAULT_XML_PROLOG: Readonly<XmlPrologOptions> = Object.freeze(xmlProlog);

export const XHTML_NAMESPACE = "http://www.w3.org/1999/xhtml";

export const XHTML1_STRICT_DOCTYPE =
  '<!DOCTYPE html PUBLIC "-//W3C//DTD XHTML 1.0 Strict//EN" ' +
  '"http://www.w3.org/TR/xhtml1/DTD/xhtml1-strict.dtd">';
