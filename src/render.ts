import { escapeHtml } from './html.js'
import type { PostRecord } from './types.js'

export const PLACEHOLDERS = {
  title: 'BLOG_TITLE',
  date: 'MONTH YEAR',
  tags: 'Tag1, Tag2, Tag3',
  intro: 'INTRODUCTION_PARAGRAPH',
  content: '<!-- CONTENT_PLACEHOLDER -->',
} as const

const TOKEN_RE = new RegExp(
  Object.values(PLACEHOLDERS)
    .map((t) => t.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'))
    .join('|'),
  'g',
)

export interface RenderedPost {
  html: string
  missing: string[]  // placeholders the template did not contain
}

function categoryLabel(post: PostRecord): string {
  return post.category.charAt(0).toUpperCase() + post.category.slice(1)
}

// ─── Body sections ────────────────────────────────────────────────────────────

export function buildPostBody(post: PostRecord, projectName: string): string {
  const out: string[] = []
  const project = escapeHtml(projectName)

  out.push('<h2>Overview</h2>')
  if (post.category === 'release' && post.version) {
    out.push(
      `<p>${project} Release ${post.version} is a milestone for the project, ` +
        'bringing new capabilities and fixes together in one update.</p>',
    )
  } else {
    out.push(`<p>${escapeHtml(post.excerpt)}</p>`)
  }

  if (post.features.length > 0) {
    out.push('<h2>New Features</h2>')
    out.push('<ul>')
    for (const f of post.features) {
      out.push(`<li><strong>${escapeHtml(f.name)}:</strong> ${escapeHtml(f.description)}</li>`)
    }
    out.push('</ul>')
  }

  if (post.changes.length > 0) {
    out.push('<h2>Key Changes</h2>')
    out.push('<ul>')
    post.changes.forEach((c) => out.push(`<li>${escapeHtml(c)}</li>`))
    out.push('</ul>')
  }

  const src = post.provenance
  if (src.kind === 'commit') {
    out.push('<h2>Commit Information</h2>')
    out.push(`<p><strong>Commit:</strong> <code>${escapeHtml(src.id)}</code></p>`)
    out.push(`<p><strong>Author:</strong> ${escapeHtml(src.author)}</p>`)
    out.push(`<p><strong>Type:</strong> ${categoryLabel(post)}</p>`)
    out.push(`<pre class="commit-message">${escapeHtml(src.message)}</pre>`)
    if (src.url) {
      out.push(`<p><a href="${escapeHtml(src.url)}" target="_blank">View commit</a></p>`)
    }
    if (src.changedFiles.length > 0) {
      out.push('<h2>Files Modified</h2>')
      out.push('<ul>')
      src.changedFiles.forEach((f) => out.push(`<li><code>${escapeHtml(f)}</code></li>`))
      out.push('</ul>')
    }
  }

  out.push('<h2>Source Information</h2>')
  const ref = src.kind === 'commit' ? `commit <code>${escapeHtml(src.id)}</code>` : `<code>${escapeHtml(post.sourceRef)}</code>`
  out.push(`<p>Extracted from ${ref} in the ${project} repository.</p>`)

  return out.join('\n')
}

// ─── Template substitution ────────────────────────────────────────────────────

/**
 * Verbatim placeholder substitution. Placeholders the template lacks are left
 * unfilled and listed in `missing`.
 */
export function renderPost(
  template: string,
  post: PostRecord,
  intro: string,
  projectName: string,
): RenderedPost {
  const values = new Map<string, string>([
    [PLACEHOLDERS.title, escapeHtml(post.title)],
    [PLACEHOLDERS.date, post.date],
    [PLACEHOLDERS.tags, escapeHtml(post.tags.join(', '))],
    [PLACEHOLDERS.intro, escapeHtml(intro)],
    [PLACEHOLDERS.content, buildPostBody(post, projectName)],
  ])

  const missing = [...values.keys()].filter((token) => !template.includes(token))

  // One pass, so substituted text is never re-scanned for tokens
  const html = template.replace(TOKEN_RE, (token) => values.get(token) ?? token)
  return { html, missing }
}
