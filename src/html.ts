const ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
}

const ENTITIES: Record<string, string> = Object.fromEntries(
  Object.entries(ESCAPES).map(([ch, entity]) => [entity, ch]),
)

export function escapeHtml(s: string): string {
  return s.replace(/[&<>"']/g, (ch) => ESCAPES[ch] ?? ch)
}

export function decodeEntities(s: string): string {
  return s.replace(/&(?:amp|lt|gt|quot|#39);/g, (e) => ENTITIES[e] ?? e)
}

export function stripTags(s: string): string {
  return s.replace(/<[^>]*>/g, '')
}

/** Tag-free, entity-decoded, whitespace-collapsed text of an HTML fragment. */
export function htmlText(fragment: string): string {
  return decodeEntities(stripTags(fragment)).replace(/\s+/g, ' ').trim()
}
