/**
 * Sanitization helpers for external feed content
 */

// Characters that could be used for log injection
const LOG_DANGEROUS_CHARS = /[\r\n\x00-\x08\x0b\x0c\x0e-\x1f]/g;

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  hellip: '…',
  mdash: '—',
  ndash: '–',
  lsquo: '‘',
  rsquo: '’',
  ldquo: '“',
  rdquo: '”',
  copy: '©',
  reg: '®',
};

function decodeCodePoint(code: number): string {
  // Control characters and invalid code points decode to nothing
  if (!Number.isFinite(code) || code < 32 || code > 0x10ffff || (code >= 0xd800 && code <= 0xdfff)) {
    return '';
  }
  return String.fromCodePoint(code);
}

/**
 * Decode named, decimal and hexadecimal HTML entities. Unknown names are left as-is.
 */
export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, body: string) => {
    if (body[0] === '#') {
      const isHex = body[1] === 'x' || body[1] === 'X';
      return decodeCodePoint(parseInt(body.slice(isHex ? 2 : 1), isHex ? 16 : 10));
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? match;
  });
}

/**
 * HTML to plain text for feed bodies.
 * Tags are replaced by a space so text from adjacent elements never fuses.
 */
export function sanitizeHtml(html: unknown): string {
  if (!html || typeof html !== 'string') {
    return '';
  }

  const text = html
    // Remove comments, script and style blocks with their contents
    .replace(/<!--[\s\S]*?-->/g, ' ')
    .replace(/<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi, ' ')
    .replace(/<style\b[^<]*(?:(?!<\/style>)<[^<]*)*<\/style>/gi, ' ')
    // Unwrap CDATA sections
    .replace(/<!\[CDATA\[([\s\S]*?)\]\]>/g, '$1')
    // Remove all remaining tags, including ones left unclosed at the end
    .replace(/<[^>]*>/g, ' ')
    .replace(/<[^>]*$/, ' ');

  return decodeEntities(text).replace(/\s+/g, ' ').trim();
}

/**
 * Sanitize input for safe logging (prevents log injection/forging)
 */
export function sanitizeForLog(input: string): string {
  if (!input || typeof input !== 'string') {
    return '';
  }

  return input
    // Remove control characters that could forge log entries
    .replace(LOG_DANGEROUS_CHARS, ' ')
    // Limit length to prevent log flooding
    .substring(0, 1000);
}
