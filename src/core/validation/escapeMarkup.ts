// `&` that does not already start a character reference
const BARE_AMPERSAND = /&(?!(?:[a-zA-Z][a-zA-Z0-9]*|#\d+|#[xX][0-9a-fA-F]+);)/g;

/**
 * HTML-escape `& < > " '`. Existing character references are left intact,
 * so escaping already-escaped text returns it unchanged.
 */
export function escapeMarkup(text: string): string {
  return text
    .replace(BARE_AMPERSAND, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');
}
