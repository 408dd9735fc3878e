/**
 * Output API.
 *
 * Markup can be consumed three ways:
 *
 *   1. renderToString: join every fragment into one string.
 *   2. iterateFragments / takeFragments: pull fragments on demand.
 *   3. toReadable: a Node.js Readable for piping to a response or file.
 *
 * Only the first one buffers the whole document.
 */

import { Readable } from "node:stream";
import { getLogger, type Logger } from "../logging/index.js";
import type { Markup } from "./raw-string.js";

export function renderToString(markup: Markup): string {
  return markup.toString();
}

export function iterateFragments(markup: Markup): Iterator<string> {
  return markup[Symbol.iterator]();
}

/**
 * Pull at most `count` fragments, leaving the rest unevaluated.
 */
export function takeFragments(markup: Markup, count: number): string[] {
  const taken: string[] = [];
  if (count <= 0) {
    return taken;
  }
  for (const fragment of markup) {
    taken.push(fragment);
    if (taken.length >= count) {
      break;
    }
  }
  return taken;
}

export interface ReadableOptions {
  /** Defaults to the shared library logger */
  logger?: Logger;
  /** Readable high water mark, in bytes */
  highWaterMark?: number;
}

function* trackFragments(
  markup: Markup,
  logger: Logger
): Generator<string, void, undefined> {
  let fragments = 0;
  let characters = 0;
  try {
    for (const fragment of markup) {
      fragments++;
      characters += fragment.length;
      if (fragment !== "") {
        yield fragment;
      }
    }
  } catch (err) {
    logger.error("Markup stream failed", {
      fragments,
      message: err instanceof Error ? err.message : String(err),
    });
    throw err;
  }
  logger.debug("Markup stream finished", { fragments, characters });
}

/**
 * Stream markup as UTF-8 bytes. Fragments are produced only as fast as
 * the stream is read.
 */
export function toReadable(markup: Markup, options: ReadableOptions = {}): Readable {
  const logger = options.logger ?? getLogger();
  return Readable.from(trackFragments(markup, logger), {
    objectMode: false,
    ...(options.highWaterMark !== undefined ? { highWaterMark: options.highWaterMark } : {}),
  });
}
