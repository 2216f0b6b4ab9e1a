import { writeFileSync } from 'fs'
import { join, resolve } from 'path'
import { classify } from './classify.js'
import {
  fetchRemoteCommits,
  readLocalCommits,
  readMarkdownDocs,
  sinceDate,
} from './collect-sources.js'
import type { Config } from './config.js'
import { extractPost, stripTrailers } from './extract.js'
import { TEMPLATE_FILE } from './rebuild-index.js'
import { renderPost } from './render.js'
import type { CommitRecord, DocRecord, PostRecord } from './types.js'
import { composeIntro, polishIntro } from './write-intro.js'

export interface CollectedSources {
  commits: CommitRecord[]
  docs: DocRecord[]
}

// ─── Collect ──────────────────────────────────────────────────────────────────

export async function collectSources(config: Config): Promise<CollectedSources> {
  const commits: CommitRecord[] = []
  const docs: DocRecord[] = []

  for (const source of config.sources) {
    console.log(`  ${source}...`)
    if (source === 'git') {
      commits.push(...readLocalCommits(config.sourceRoot, config.daysBack))
    } else if (source === 'github' && config.githubRepo) {
      const repo = { ...config.githubRepo, token: config.githubToken }
      commits.push(...(await fetchRemoteCommits(repo, sinceDate(config.date, config.daysBack))))
    } else if (source === 'markdown') {
      docs.push(...readMarkdownDocs(config.sourceRoot))
    }
  }

  // The same commit can arrive from both git and github; first one wins
  const byId = new Map<string, CommitRecord>()
  for (const c of commits) if (!byId.has(c.id)) byId.set(c.id, c)

  console.log(`  → ${byId.size} commits · ${docs.length} documents`)
  return { commits: [...byId.values()], docs }
}

// ─── Classify + extract ───────────────────────────────────────────────────────

export interface SelectOptions {
  projectName: string
  now: string
  domainKeywords: string[]
}

export function selectPosts(sources: CollectedSources, opts: SelectOptions): PostRecord[] {
  const posts: PostRecord[] = []

  for (const commit of sources.commits) {
    const { isSignificant } = classify(`${commit.subject}\n${stripTrailers(commit.body)}`, opts.domainKeywords)
    if (!isSignificant) continue
    const post = extractPost(commit, opts)
    if (!post) continue
    posts.push(post)
    const label = post.category === 'release' ? `🚀 Release ${post.version ?? ''}`.trim() : `📝 ${post.category}`
    console.log(`     ${label}: ${post.title}`)
  }

  for (const doc of sources.docs) {
    const post = extractPost(doc, opts)
    if (!post) {
      console.log(`     (no title, version or features in ${doc.sourcePath} — skipped)`)
      continue
    }
    posts.push(post)
    console.log(`     📄 ${post.title} (${doc.sourcePath})`)
  }

  return posts
}

// ─── Render + write ───────────────────────────────────────────────────────────

/** Writes one file per post and returns the filenames, in order. */
export async function writePosts(
  posts: PostRecord[],
  template: string,
  config: Config,
): Promise<string[]> {
  const written = new Map<string, string>()  // filename → sourceRef
  let reportedMissing = false

  for (const post of posts) {
    const target = join(config.blogDir, post.slug)
    if (post.slug === TEMPLATE_FILE || resolve(target) === resolve(config.templatePath)) {
      console.warn(`  ⚠ ${post.slug}: ${post.sourceRef} would overwrite the post template — skipped`)
      continue
    }

    let intro = composeIntro(post, config.projectName)
    if (config.polishIntros) intro = await polishIntro(post, intro, config.introModel)

    const { html, missing } = renderPost(template, post, intro, config.projectName)
    if (missing.length > 0 && !reportedMissing) {
      console.warn(`  ⚠ Template has no ${missing.join(', ')} — left unfilled`)
      reportedMissing = true
    }

    const previous = written.get(post.slug)
    if (previous !== undefined) {
      console.warn(`  ⚠ ${post.slug}: ${post.sourceRef} overwrites ${previous}`)
    }
    written.set(post.slug, post.sourceRef)

    if (config.dryRun) {
      console.log(`     Would write: ${post.slug}`)
      continue
    }
    writeFileSync(target, html, 'utf-8')
    console.log(`     Written: ${post.slug}`)
  }

  return [...written.keys()]
}

// ─── Run summary ──────────────────────────────────────────────────────────────

export function closingLine(dryRun: boolean, indexed: boolean): string {
  if (!indexed) return '\n⚠  Finished without updating the index.'
  return dryRun ? '\n✓ Dry run complete — no files written.' : '\n✓ Done.'
}
