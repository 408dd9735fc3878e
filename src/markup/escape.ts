const ESCAPE_RE = /[&<>"]/g;

const ESCAPE_MAP: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
};

/**
 * Escape text for use in element content or a double-quoted attribute.
 */
export function escapeMarkup(text: string): string {
  ESCAPE_RE.lastIndex = 0;
  if (!ESCAPE_RE.test(text)) {
    return text;
  }
  return text.replace(ESCAPE_RE, (ch) => ESCAPE_MAP[ch] ?? ch);
}
