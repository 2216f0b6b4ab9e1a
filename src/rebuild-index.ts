/**
 * Index rebuild
 *
 * The index is derived from what is on disk, not from the run that produced
 * the posts: every rendered post is re-read and re-parsed, so posts added,
 * removed or hand-edited outside the pipeline show up correctly.
 */

import { existsSync, readFileSync, readdirSync, writeFileSync } from 'fs'
import { dirname, join, relative, sep } from 'path'
import { extractPost, formatMonthYear } from './extract.js'
import { escapeHtml } from './html.js'
import type { ExtractOptions, PostRecord, RenderedPostRecord } from './types.js'

export const SECTION_OPEN = '<section class="blog-posts">'
export const SECTION_CLOSE = '</section>'
export const TEMPLATE_FILE = 'template.html'

// ─── Round-trip reader ────────────────────────────────────────────────────────

/**
 * Newest first. Posts whose date could not be parsed carry the run date and
 * therefore sort with the newest.
 */
export function rebuildIndex(posts: RenderedPostRecord[], opts: ExtractOptions): PostRecord[] {
  return posts
    .map((p) => extractPost(p, opts))
    .filter((p): p is PostRecord => p !== null)
    .sort((a, b) => b.date.localeCompare(a.date))
}

export function scanPostsDir(blogDir: string): RenderedPostRecord[] {
  if (!existsSync(blogDir)) {
    console.warn(`  ⚠ Posts directory ${blogDir} not found`)
    return []
  }

  const records: RenderedPostRecord[] = []
  const files = readdirSync(blogDir)
    .filter((f) => f.endsWith('.html') && f !== TEMPLATE_FILE)
    .sort()

  for (const f of files) {
    const filePath = join(blogDir, f)
    try {
      records.push({ kind: 'rendered', filePath, rawHtml: readFileSync(filePath, 'utf-8') })
    } catch (err) {
      console.warn(`  ⚠ Could not read ${f} — skipped (${err instanceof Error ? err.message : String(err)})`)
    }
  }
  return records
}

// ─── Index document ───────────────────────────────────────────────────────────

export function renderIndexEntry(post: PostRecord, postsHref: string): string {
  const href = escapeHtml(postsHref ? `${postsHref}/${post.slug}` : post.slug)
  return `<article class="blog-post">
            <header class="post-header">
                <h2><a href="${href}">${escapeHtml(post.title)}</a></h2>
                <div class="post-meta">
                    <span class="post-date">${formatMonthYear(post.date)}</span>
                    <span class="post-tags">${escapeHtml(post.tags.join(', '))}</span>
                </div>
            </header>
            <div class="post-excerpt">
                <p>${escapeHtml(post.excerpt)}</p>
                <p><a href="${href}" class="read-more">Read Full Post →</a></p>
            </div>
        </article>`
}

/**
 * Swaps the contents of the blog-posts section. Null when either marker is
 * missing; the caller must not write anything in that case.
 */
export function replaceIndexSection(indexHtml: string, entries: string[]): string | null {
  const start = indexHtml.indexOf(SECTION_OPEN)
  if (start === -1) return null
  const end = indexHtml.indexOf(SECTION_CLOSE, start + SECTION_OPEN.length)
  if (end === -1) return null

  const inner = entries.length > 0 ? `\n        ${entries.join('\n        ')}\n        ` : '\n        '
  return indexHtml.slice(0, start + SECTION_OPEN.length) + inner + indexHtml.slice(end)
}

export function postsHrefFor(indexPath: string, blogDir: string): string {
  return relative(dirname(indexPath), blogDir).split(sep).join('/')
}

// ─── Main export ──────────────────────────────────────────────────────────────

export interface RegenerateOptions extends ExtractOptions {
  blogDir: string
  indexPath: string
  dryRun: boolean
}

/** Rebuilds the index from the posts directory. False when the index document is unusable. */
export function regenerateIndex(opts: RegenerateOptions): boolean {
  if (!existsSync(opts.indexPath)) {
    console.error(`❌ Blog index not found at ${opts.indexPath}`)
    return false
  }

  const posts = rebuildIndex(scanPostsDir(opts.blogDir), opts)
  console.log(`  → ${posts.length} post(s) found`)
  for (const p of posts) {
    const label = p.category === 'release' && p.version ? `Release ${p.version}` : p.category
    console.log(`     ${p.date}  [${label}] ${p.title}`)
    if (p.dateInferred) console.warn(`  ⚠ ${p.slug}: unreadable date — listed as ${p.date}`)
  }

  const href = postsHrefFor(opts.indexPath, opts.blogDir)
  const updated = replaceIndexSection(
    readFileSync(opts.indexPath, 'utf-8'),
    posts.map((p) => renderIndexEntry(p, href)),
  )
  if (updated === null) {
    console.error(`❌ ${opts.indexPath} has no ${SECTION_OPEN} … ${SECTION_CLOSE} section — index not updated`)
    return false
  }

  if (opts.dryRun) {
    console.log('  (dry run — index not written)')
    return true
  }
  writeFileSync(opts.indexPath, updated, 'utf-8')
  console.log(`     Written: ${opts.indexPath}`)
  return true
}
