/**
 * commit-blog index regeneration
 *
 * Rebuilds blog.html from the posts already in blog/, without collecting or
 * rendering anything. Use after adding, removing or hand-editing posts.
 *
 * Env vars: BLOG_DIR, INDEX_PATH, PROJECT_NAME, SOURCE_ROOT, DATE_OVERRIDE, DRY_RUN
 */

import { ZodError } from 'zod'
import { formatConfigError, loadConfig } from './config.js'
import { regenerateIndex } from './rebuild-index.js'

function main() {
  const config = loadConfig()

  console.log(`\n🗂  commit-blog index — ${config.date}`)
  console.log(`   Mode: ${config.dryRun ? 'dry run' : 'live'}`)
  console.log()

  const ok = regenerateIndex({
    blogDir: config.blogDir,
    indexPath: config.indexPath,
    projectName: config.projectName,
    now: config.date,
    dryRun: config.dryRun,
  })

  if (!ok) process.exit(1)
  console.log(config.dryRun ? '\n✓ Dry run complete — no files written.' : '\n✓ Index regenerated.')
}

try {
  main()
} catch (err) {
  if (err instanceof ZodError) {
    console.error(`❌ Invalid configuration — ${formatConfigError(err)}`)
  } else {
    console.error('\n❌ Fatal:', err)
  }
  process.exit(1)
}
