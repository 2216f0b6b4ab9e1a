import { execFileSync } from 'child_process'
import { existsSync, readFileSync, readdirSync } from 'fs'
import { join, relative, sep } from 'path'
import { z } from 'zod'
import type { CommitRecord, DocRecord } from './types.js'

const GITHUB_API = 'https://api.github.com'
const RECORD_SEP = '\x1e'
const API_TIMEOUT_MS = 30_000
const SKIP_DIRS = new Set(['.git', 'node_modules'])
const SKIP_DOCS = new Set(['CONTRIBUTING.md'])

function errMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

// ─── Source A: local git ──────────────────────────────────────────────────────

function git(args: string[], cwd: string): string {
  return execFileSync('git', args, {
    encoding: 'utf-8',
    cwd,
    timeout: 60_000,
    maxBuffer: 64 * 1024 * 1024,
  })
}

function tryGit(args: string[], cwd: string): string | null {
  try {
    return git(args, cwd)
  } catch {
    return null
  }
}

/**
 * Parses `%H|%an|%ad|%s|%b%x1e` output. Records with fewer than four fields are
 * dropped; anything after the fourth `|` belongs to the body.
 */
export function parseGitLog(output: string): CommitRecord[] {
  const commits: CommitRecord[] = []
  for (const chunk of output.split(RECORD_SEP)) {
    const record = chunk.replace(/^[\r\n]+/, '')
    if (!record.trim()) continue

    const parts = record.split('|')
    if (parts.length < 4) continue
    const [id, author, date, subject, ...rest] = parts

    commits.push({
      kind: 'commit',
      id: id.trim(),
      author: author.trim(),
      date: date.trim(),
      subject: subject.trim(),
      body: rest.join('|').trim(),
      changedFiles: [],
    })
  }
  return commits
}

export function getChangedFiles(repoDir: string, commitId: string): string[] {
  const out = tryGit(['show', '--name-only', '--pretty=format:', commitId], repoDir)
  if (!out) return []
  return out.split('\n').map((l) => l.trim()).filter(Boolean)
}

function isSourceFile(path: string): boolean {
  return path.endsWith('.c') || path.endsWith('.h')
}

function readDocAtCommit(repoDir: string, commitId: string, path: string): DocRecord | null {
  const rawText = tryGit(['show', `${commitId}:${path}`], repoDir)
  return rawText === null ? null : { kind: 'doc', sourcePath: path, rawText }
}

export function readLocalCommits(repoDir: string, daysBack: number): CommitRecord[] {
  if (!existsSync(join(repoDir, '.git'))) {
    console.warn(`  ⚠ No git repository at ${repoDir} — skipped`)
    return []
  }

  let output: string
  try {
    output = git(
      ['log', `--since=${daysBack} days ago`, '--pretty=format:%H|%an|%ad|%s|%b%x1e', '--date=short'],
      repoDir,
    )
  } catch (err) {
    console.warn(`  ⚠ git log failed — skipped (${errMessage(err)})`)
    return []
  }

  const snapshots = (id: string, files: string[]) =>
    files
      .map((f) => readDocAtCommit(repoDir, id, f))
      .filter((d): d is DocRecord => d !== null)

  return parseGitLog(output).map((c) => {
    const changedFiles = getChangedFiles(repoDir, c.id)
    return {
      ...c,
      changedFiles,
      docSnapshots: snapshots(c.id, changedFiles.filter((f) => f.endsWith('.md'))),
      sourceSnapshots: snapshots(c.id, changedFiles.filter(isSourceFile)),
    }
  })
}

// ─── Source B: remote commit API ──────────────────────────────────────────────

const ghCommitSchema = z.object({
  sha: z.string(),
  html_url: z.string(),
  commit: z.object({
    message: z.string(),
    author: z.object({ name: z.string(), date: z.string() }).nullable(),
  }),
})

const ghCommitPageSchema = z.array(ghCommitSchema)

type GHCommit = z.infer<typeof ghCommitSchema>

export interface RemoteRepo {
  owner: string
  name: string
  token?: string
}

export function nextPageUrl(link: string | null): string | null {
  if (!link) return null
  for (const part of link.split(',')) {
    const m = part.match(/<([^>]+)>\s*;\s*rel="next"/)
    if (m) return m[1]
  }
  return null
}

export function toCommitRecord(c: GHCommit): CommitRecord {
  const [subject = '', ...bodyLines] = c.commit.message.split('\n')
  return {
    kind: 'commit',
    id: c.sha,
    author: c.commit.author?.name ?? 'unknown',
    date: (c.commit.author?.date ?? '').slice(0, 10),
    subject: subject.trim(),
    body: bodyLines.join('\n').trim(),
    changedFiles: [],
    sourceUrl: c.html_url,
  }
}

/**
 * All commits since `since`, following `rel="next"` links. One failed page
 * drops the whole source rather than returning a partial list.
 */
export async function fetchRemoteCommits(repo: RemoteRepo, since: string): Promise<CommitRecord[]> {
  const headers: Record<string, string> = {
    Accept: 'application/vnd.github+json',
    'User-Agent': 'commit-blog',
  }
  if (repo.token) headers.Authorization = `Bearer ${repo.token}`

  const params = new URLSearchParams({ since, per_page: '100' })
  let url: string | null = `${GITHUB_API}/repos/${repo.owner}/${repo.name}/commits?${params}`
  const all: GHCommit[] = []

  try {
    while (url) {
      const res: Response = await fetch(url, { headers, signal: AbortSignal.timeout(API_TIMEOUT_MS) })
      if (!res.ok) {
        console.warn(`  ⚠ GitHub ${res.status} ${res.statusText} for ${repo.owner}/${repo.name} — skipped`)
        return []
      }
      const page = ghCommitPageSchema.parse(await res.json())
      all.push(...page)
      url = nextPageUrl(res.headers.get('link'))
      if (url) console.log(`  Fetched ${page.length} commits, following next page...`)
    }
  } catch (err) {
    console.warn(`  ⚠ GitHub commits for ${repo.owner}/${repo.name} — skipped (${errMessage(err)})`)
    return []
  }

  console.log(`  Total commits fetched: ${all.length}`)
  return all.map(toCommitRecord)
}

// ─── Source C: markdown documents ─────────────────────────────────────────────

function walkMarkdown(dir: string, out: string[]): void {
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const full = join(dir, entry.name)
    if (entry.isDirectory()) {
      if (!SKIP_DIRS.has(entry.name)) walkMarkdown(full, out)
    } else if (entry.isFile() && entry.name.endsWith('.md') && !SKIP_DOCS.has(entry.name)) {
      out.push(full)
    }
  }
}

/** README.md at the root first, then every other document by path. */
export function readMarkdownDocs(root: string): DocRecord[] {
  if (!existsSync(root)) {
    console.warn(`  ⚠ Source directory ${root} not found — skipped`)
    return []
  }

  const files: string[] = []
  try {
    walkMarkdown(root, files)
  } catch (err) {
    console.warn(`  ⚠ Could not scan ${root} — skipped (${errMessage(err)})`)
    return []
  }

  const docs: DocRecord[] = []
  for (const file of files) {
    const sourcePath = relative(root, file).split(sep).join('/')
    try {
      docs.push({ kind: 'doc', sourcePath, rawText: readFileSync(file, 'utf-8') })
    } catch (err) {
      console.warn(`  ⚠ Could not read ${sourcePath} — skipped (${errMessage(err)})`)
    }
  }

  const key = (d: DocRecord) => (d.sourcePath === 'README.md' ? '' : d.sourcePath)
  return docs.sort((a, b) => (key(a) < key(b) ? -1 : key(a) > key(b) ? 1 : 0))
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

/** ISO timestamp `daysBack` days before `date` (YYYY-MM-DD), at midnight UTC. */
export function sinceDate(date: string, daysBack: number): string {
  const d = new Date(`${date}T00:00:00Z`)
  d.setUTCDate(d.getUTCDate() - daysBack)
  return d.toISOString().replace(/\.\d{3}Z$/, 'Z')
}
