/**
 * Render bytes as a byte-string literal: `b'abc'`, `b"it's"`, `b'\x00\xff'`.
 *
 * Session ids in decoded frames use this form.
 */

const SINGLE_QUOTE = 0x27;
const DOUBLE_QUOTE = 0x22;
const BACKSLASH = 0x5c;

const NAMED_ESCAPES: Record<number, string> = {
  0x09: "\\t",
  0x0a: "\\n",
  0x0d: "\\r",
};

export function bytesLiteral(bytes: Uint8Array): string {
  const quote =
    bytes.includes(SINGLE_QUOTE) && !bytes.includes(DOUBLE_QUOTE)
      ? DOUBLE_QUOTE
      : SINGLE_QUOTE;

  let body = "";
  for (const byte of bytes) {
    const named = NAMED_ESCAPES[byte];
    if (byte === quote || byte === BACKSLASH) {
      body += `\\${String.fromCharCode(byte)}`;
    } else if (named !== undefined) {
      body += named;
    } else if (byte < 0x20 || byte >= 0x7f) {
      body += `\\x${byte.toString(16).padStart(2, "0")}`;
    } else {
      body += String.fromCharCode(byte);
    }
  }

  const q = String.fromCharCode(quote);
  return `b${q}${body}${q}`;
}
