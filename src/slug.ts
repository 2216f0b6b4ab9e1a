import type { Category } from './types.js'

export interface Disambiguator {
  kind: 'release' | 'commit'
  id: string  // version number or short commit id
}

const SHORT_ID_LENGTH = 8

export function slugify(title: string): string {
  const slug = title
    .replace(/[^A-Za-z0-9\s-]/g, '')
    .trim()
    .replace(/\s+/g, '-')
    .toLowerCase()
  return slug || 'untitled'
}

/**
 * Output filename for a post. Deterministic in its inputs; two different titles
 * can still land on the same name; callers decide what to do about that.
 */
export function assignSlug(title: string, disambiguator?: Disambiguator): string {
  const base = slugify(title)
  if (!disambiguator) return `${base}.html`
  return `${disambiguator.kind}-${disambiguator.id}-${base}.html`
}

/**
 * Picks the disambiguator for a post: releases with a version are keyed by it,
 * other commits by their short id, documents by title alone.
 */
export function disambiguatorFor(
  category: Category,
  version: string | null,
  commitId?: string,
): Disambiguator | undefined {
  if (category === 'release' && version) return { kind: 'release', id: version }
  if (commitId) return { kind: 'commit', id: commitId.slice(0, SHORT_ID_LENGTH) }
  return undefined
}
