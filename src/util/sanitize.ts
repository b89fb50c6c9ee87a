/**
 * Text sanitization for user-authored task fields.
 */

const NULL_BYTE = '\u0000'

const HTML_ESCAPES: ReadonlyArray<[RegExp, string]> = [
  [/&/g, '&amp;'],
  [/</g, '&lt;'],
  [/>/g, '&gt;'],
  [/"/g, '&quot;'],
  [/'/g, '&#x27;'],
]

export function hasNullByte(text: string): boolean {
  return text.includes(NULL_BYTE)
}

export function stripNullBytes(text: string): string {
  return text.split(NULL_BYTE).join('')
}

/** `&` goes first so existing entities are escaped exactly once. */
export function escapeHtml(text: string): string {
  return HTML_ESCAPES.reduce((out, [pattern, entity]) => out.replace(pattern, entity), text)
}
