/**
 * Field extraction
 *
 * Turns one RawRecord into a canonical PostRecord using tolerant line and
 * pattern scans. Every optional field has a default; only a record with no
 * title, no version and no features is rejected (returns null).
 */

import { basename } from 'path'
import { categorize } from './classify.js'
import { decodeEntities, htmlText, stripTags } from './html.js'
import { assignSlug, disambiguatorFor } from './slug.js'
import {
  CATEGORIES,
  type Category,
  type CommitRecord,
  type DocRecord,
  type ExtractOptions,
  type Feature,
  type PostRecord,
  type RawRecord,
  type RenderedPostRecord,
} from './types.js'

export const TITLE_MAX = 60
export const EXCERPT_MAX = 200

const VERSION_RE = /(?:release|version)\s+(\d+)/i
const HEADING_RE = /^#\s+(.+)$/m
const FEATURE_RE = /^\s*[-*]\s*\*\*(.+?)\*\*:\s*(.+)$/
const BULLET_RE = /^\s*[-*]\s+(.+)$/
const CHANGES_HEADING_RE = /^##\s+(?:changes?|what's new|updates?)\s*$/i
const TRAILER_RE = /^\s*(?:co-authored-by|signed-off-by):.*$/i
// A `/** … */` block directly followed by a function signature
const DOC_COMMENT_RE = /\/\*\*\s*((?:(?!\*\/)[\s\S])+?)\s*\*\/\s*\n\s*\w+\s+\**\s*\w+\s*\([^)]*\)/g

const MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
]

// ─── Text helpers ─────────────────────────────────────────────────────────────

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text
}

function lines(text: string): string[] {
  return text.split(/\r?\n/)
}

export function extractVersion(text: string): string | null {
  return text.match(VERSION_RE)?.[1] ?? null
}

export function extractHeading(markdown: string): string | null {
  const m = markdown.match(HEADING_RE)
  return m ? m[1].trim() : null
}

/** `- **Name**: Description` bullets, in document order, duplicates kept. */
export function extractFeatures(text: string): Feature[] {
  const features: Feature[] = []
  for (const line of lines(text)) {
    const m = line.match(FEATURE_RE)
    if (m) features.push({ name: m[1].trim(), description: m[2].trim() })
  }
  return features
}

export const SOURCE_FEATURE_NAME = 'New Functionality'

/** Doc comments that sit right above a C function definition. */
export function extractCommentFeatures(source: string): Feature[] {
  const features: Feature[] = []
  for (const m of source.matchAll(DOC_COMMENT_RE)) {
    const description = lines(m[1])
      .map((l) => l.replace(/^\s*\*\s?/, '').trim())
      .filter(Boolean)
      .join(' ')
    if (description) features.push({ name: SOURCE_FEATURE_NAME, description })
  }
  return features
}

/** Bullets under the first "## Changes" / "## What's New" / "## Updates" section. */
export function extractChanges(markdown: string): string[] {
  const all = lines(markdown)
  const start = all.findIndex((l) => CHANGES_HEADING_RE.test(l.trim()))
  if (start === -1) return []

  const changes: string[] = []
  for (const line of all.slice(start + 1)) {
    if (/^##/.test(line)) break
    const m = line.match(BULLET_RE)
    if (m && m[1].trim()) changes.push(m[1].trim())
  }
  return changes
}

export function stripTrailers(body: string): string {
  return lines(body)
    .filter((l) => !TRAILER_RE.test(l))
    .join('\n')
    .trim()
}

/** First block of plain prose: not a heading, list, quote, fence or table. */
export function firstParagraph(text: string): string | null {
  for (const block of text.split(/\r?\n\s*\r?\n/)) {
    const trimmed = block.trim()
    if (!trimmed || /^(#|[-*+]\s|>|```|\||<!--)/.test(trimmed)) continue
    return trimmed.replace(/\s+/g, ' ')
  }
  return null
}

function titleCase(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1)
}

export function tagsFor(
  category: Category,
  version: string | null,
  projectName: string,
  kind: 'commit' | 'doc',
): string[] {
  if (category === 'release') {
    return version ? ['Release', projectName, `Version ${version}`] : ['Release', projectName]
  }
  return [titleCase(category), projectName, kind === 'commit' ? 'Development' : 'Update']
}

// ─── Dates ────────────────────────────────────────────────────────────────────

function pad2(n: number): string {
  return String(n).padStart(2, '0')
}

function isoDate(year: number, month: number, day: number): string | null {
  const d = new Date(Date.UTC(year, month - 1, day))
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    return null
  }
  return `${year}-${pad2(month)}-${pad2(day)}`
}

/** `YYYY-MM-DD` first, then `Month YYYY` (first of the month). */
export function parsePostDate(raw: string): string | null {
  const s = raw.trim()
  const iso = s.match(/^(\d{4})-(\d{1,2})-(\d{1,2})$/)
  if (iso) return isoDate(Number(iso[1]), Number(iso[2]), Number(iso[3]))

  const my = s.match(/^([A-Za-z]+)\s+(\d{4})$/)
  if (my) {
    const month = MONTHS.indexOf(my[1].toLowerCase())
    if (month !== -1) return isoDate(Number(my[2]), month + 1, 1)
  }
  return null
}

export function formatMonthYear(date: string): string {
  const [year, month] = date.split('-')
  const name = MONTHS[Number(month) - 1]
  return name ? `${titleCase(name)} ${year}` : date
}

// ─── Commit records ───────────────────────────────────────────────────────────

function extractCommit(raw: CommitRecord, opts: ExtractOptions): PostRecord | null {
  const body = stripTrailers(raw.body)
  const subject = raw.subject.trim()
  const text = `${subject}\n${body}`

  const version = extractVersion(text)
  const features = [
    ...extractFeatures(body),
    ...(raw.docSnapshots ?? []).flatMap((d) => extractFeatures(d.rawText)),
    ...(raw.sourceSnapshots ?? []).flatMap((d) => extractCommentFeatures(d.rawText)),
  ]
  if (!subject && !version && features.length === 0) return null

  const shortId = raw.id.slice(0, 8)
  const title = subject ? truncate(subject, TITLE_MAX) : `${opts.projectName} update ${shortId}`
  const category = categorize(text)
  const parsedDate = parsePostDate(raw.date)

  return {
    title,
    date: parsedDate ?? opts.now,
    dateInferred: parsedDate === null,
    category,
    version,
    features,
    changes: extractChanges(body),
    tags: tagsFor(category, version, opts.projectName, 'commit'),
    excerpt: truncate(firstParagraph(body) ?? subject, EXCERPT_MAX),
    sourceRef: raw.id,
    slug: assignSlug(title, disambiguatorFor(category, version, raw.id)),
    provenance: {
      kind: 'commit',
      id: raw.id,
      author: raw.author,
      message: body ? `${subject}\n\n${body}` : subject,
      url: raw.sourceUrl,
      changedFiles: raw.changedFiles,
    },
  }
}

// ─── Markdown documents ───────────────────────────────────────────────────────

function extractDoc(raw: DocRecord, opts: ExtractOptions): PostRecord | null {
  const heading = extractHeading(raw.rawText)
  const version = extractVersion(raw.rawText)
  const features = extractFeatures(raw.rawText)
  if (!heading && !version && features.length === 0) return null

  const title = truncate(heading ?? `${opts.projectName} Update - ${raw.sourcePath}`, TITLE_MAX)
  const category: Category = version ? 'release' : categorize(title)

  return {
    title,
    date: opts.now,
    dateInferred: false,
    category,
    version,
    features,
    changes: extractChanges(raw.rawText),
    tags: tagsFor(category, version, opts.projectName, 'doc'),
    excerpt: truncate(firstParagraph(raw.rawText) ?? title, EXCERPT_MAX),
    sourceRef: raw.sourcePath,
    slug: assignSlug(title, disambiguatorFor(category, version)),
    provenance: { kind: 'doc', path: raw.sourcePath },
  }
}

// ─── Rendered posts (round-trip) ──────────────────────────────────────────────

export function fallbackExcerpt(projectName: string): string {
  return `Development update that brings improvements and new features to ${projectName}.`
}

export function extractExcerpt(html: string, projectName: string): string {
  const intro = html.match(/<p class="post-intro">([\s\S]*?)<\/p>/)
  const para = intro ?? html.match(/<p(?:\s[^>]*)?>([\s\S]*?)<\/p>/)
  if (!para) return fallbackExcerpt(projectName)
  return truncate(htmlText(para[1]), EXCERPT_MAX)
}

export function extractPostDate(html: string): string | null {
  const m = html.match(/<span class="post-date">([\s\S]*?)<\/span>/)
  return m ? parsePostDate(htmlText(m[1])) : null
}

function categoryFromTags(tags: string[]): Category {
  const first = (tags[0] ?? '').toLowerCase().replace(/[^a-z]/g, '')
  return CATEGORIES.find((c) => c === first) ?? 'update'
}

function extractRendered(raw: RenderedPostRecord, opts: ExtractOptions): PostRecord | null {
  const h1 = raw.rawHtml.match(/<h1[^>]*>([\s\S]*?)<\/h1>/)
  if (!h1) return null
  // Trimmed only: the title must come back exactly as it was rendered
  const title = decodeEntities(stripTags(h1[1])).trim()

  const tagsMatch = raw.rawHtml.match(/<span class="post-tags">([\s\S]*?)<\/span>/)
  const tagsText = tagsMatch ? htmlText(tagsMatch[1]) : `${opts.projectName}, Update`
  const tags = tagsText.split(',').map((t) => t.trim()).filter(Boolean)

  let category = categoryFromTags(tags)
  let version: string | null = null
  if (tagsText.includes('Release')) {
    category = 'release'
    version = tagsText.match(/Version (\d+)/)?.[1] ?? title.match(/Release (\d+)/i)?.[1] ?? null
  }

  const date = extractPostDate(raw.rawHtml)
  const features = [...raw.rawHtml.matchAll(/<li><strong>([\s\S]*?):<\/strong>([\s\S]*?)<\/li>/g)]
    .map((m) => ({ name: htmlText(m[1]), description: htmlText(m[2]) }))

  return {
    title,
    date: date ?? opts.now,
    dateInferred: date === null,
    category,
    version,
    features,
    changes: [],
    tags,
    excerpt: extractExcerpt(raw.rawHtml, opts.projectName),
    sourceRef: raw.filePath,
    slug: basename(raw.filePath),
    provenance: { kind: 'rendered', filePath: raw.filePath },
  }
}

// ─── Main export ──────────────────────────────────────────────────────────────

export function extractPost(raw: RawRecord, opts: ExtractOptions): PostRecord | null {
  switch (raw.kind) {
    case 'commit':
      return extractCommit(raw, opts)
    case 'doc':
      return extractDoc(raw, opts)
    case 'rendered':
      return extractRendered(raw, opts)
  }
}
