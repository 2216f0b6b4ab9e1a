#!/usr/bin/env node
/**
 * commit-blog
 *
 * Four-phase batch run:
 *   1. Collect  — commits from local git and/or the GitHub API, markdown docs
 *   2. Select   — keep significant commits, extract one PostRecord per source record
 *   3. Render   — substitute each post into blog/template.html, one file per post
 *   4. Index    — rebuild blog.html from whatever posts are on disk
 *
 * Env vars (see src/config.ts):
 *   SOURCE_ROOT        default: "source"
 *   SOURCES            comma list of git, github, markdown (default "git,markdown")
 *   GITHUB_REPO        owner/name, required for the github source
 *   DAYS_BACK          default: 30
 *   DATE_OVERRIDE      ISO date string, default: today UTC
 *   DRY_RUN            "true" → print what would be written, skip all writes
 *   POLISH_INTROS      "true" → rewrite intros with Claude (needs ANTHROPIC_API_KEY)
 */

import { existsSync, mkdirSync, readFileSync } from 'fs'
import { ZodError } from 'zod'
import { formatConfigError, loadConfig, type Config } from './config.js'
import { closingLine, collectSources, selectPosts, writePosts } from './generate-posts.js'
import { regenerateIndex } from './rebuild-index.js'

function readConfig(): Config {
  try {
    return loadConfig()
  } catch (err) {
    if (err instanceof ZodError) {
      console.error(`❌ Invalid configuration — ${formatConfigError(err)}`)
      process.exit(1)
    }
    throw err
  }
}

async function main() {
  const config = readConfig()

  console.log(`\n📝 commit-blog — ${config.date}`)
  console.log(`   Project: ${config.projectName}`)
  console.log(`   Sources: ${config.sources.join(', ')}`)
  console.log(`   Mode: ${config.dryRun ? 'dry run' : 'live'}`)

  const needsRoot = config.sources.some((s) => s === 'git' || s === 'markdown')
  if (needsRoot && !existsSync(config.sourceRoot)) {
    console.error(`❌ Source directory not found at ${config.sourceRoot}`)
    process.exit(1)
  }
  if (!existsSync(config.templatePath)) {
    console.error(`❌ Blog template not found at ${config.templatePath}`)
    process.exit(1)
  }
  if (config.polishIntros && !process.env.ANTHROPIC_API_KEY) {
    console.warn('⚠  ANTHROPIC_API_KEY not set — intros will not be polished')
    config.polishIntros = false
  }
  console.log()

  // ── 1. Collect ─────────────────────────────────────────────────────────────
  console.log('1/4  Collecting sources...')
  const sources = await collectSources(config)
  console.log()

  // ── 2. Select ──────────────────────────────────────────────────────────────
  console.log('2/4  Selecting significant updates...')
  const posts = selectPosts(sources, {
    projectName: config.projectName,
    now: config.date,
    domainKeywords: config.domainKeywords,
  })
  console.log(`     ${posts.length} post(s)`)
  console.log()

  // ── 3. Render ──────────────────────────────────────────────────────────────
  if (posts.length === 0) {
    console.log('3/4  Nothing to render (documentation-only commits are excluded)')
  } else {
    console.log(`3/4  Rendering ${posts.length} post(s)...`)
    if (!config.dryRun && !existsSync(config.blogDir)) {
      mkdirSync(config.blogDir, { recursive: true })
    }
    await writePosts(posts, readFileSync(config.templatePath, 'utf-8'), config)
  }
  console.log()

  // ── 4. Index ───────────────────────────────────────────────────────────────
  console.log('4/4  Rebuilding index from posts on disk...')
  const indexed = regenerateIndex({
    blogDir: config.blogDir,
    indexPath: config.indexPath,
    projectName: config.projectName,
    now: config.date,
    dryRun: config.dryRun,
  })

  if (!indexed) {
    console.warn(closingLine(config.dryRun, indexed))
    process.exit(1)
  }
  console.log(closingLine(config.dryRun, indexed))
}

main().catch((err) => {
  console.error('\n❌ Fatal:', err)
  process.exit(1)
})
