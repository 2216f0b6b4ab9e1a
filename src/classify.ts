import type { Category, Classification } from './types.js'

// Any one of these marks a commit as worth a post
export const SIGNIFICANT_KEYWORDS = [
  'release', 'version', 'major', 'feature', 'new', 'add', 'implement',
  'complete', 'rewrite', 'overhaul', 'fix', 'bug', 'improve', 'enhance',
  'kernel', 'driver', 'filesystem', 'game', 'engine', 'assembler',
  'memory', 'system', 'optimize', 'performance', 'security',
] as const

export const DOC_KEYWORDS = [
  'docs', 'documentation', 'readme', 'contributing', 'changelog',
  'update readme', 'fix readme', 'update docs', 'fix docs',
] as const

// First match wins, top to bottom. Anything left over is an 'update'.
const CATEGORY_CHAIN: Array<[Exclude<Category, 'update'>, readonly string[]]> = [
  ['release', ['release']],
  ['feature', ['feature', 'new', 'add', 'implement']],
  ['fix', ['fix', 'bug', 'patch']],
  ['improvement', ['improve', 'enhance', 'optimize']],
]

export function normalize(text: string): string {
  return text.toLowerCase().split(/\s+/).filter(Boolean).join(' ')
}

/** Release commits are never documentation-only, whatever else they touch. */
export function isDocumentationOnly(text: string): boolean {
  const msg = normalize(text)
  if (msg.includes('release')) return false
  return DOC_KEYWORDS.some((k) => msg.includes(k))
}

export function categorize(text: string): Category {
  const msg = normalize(text)
  for (const [category, words] of CATEGORY_CHAIN) {
    if (words.some((w) => msg.includes(w))) return category
  }
  return 'update'
}

export function classify(
  rawText: string,
  extraKeywords: readonly string[] = [],
): Classification {
  const msg = normalize(rawText)
  const category = categorize(msg)

  if (isDocumentationOnly(msg)) {
    return { isSignificant: false, category }
  }

  const keywords = [...SIGNIFICANT_KEYWORDS, ...extraKeywords.map((k) => k.toLowerCase())]
  return { isSignificant: keywords.some((k) => msg.includes(k)), category }
}
