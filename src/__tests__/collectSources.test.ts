import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'

// --- fixtures ------------------------------------------------------------------

const LOG =
  'aaa111|Ada|2024-05-01|Release 14: paging|Body line one\nBody | with pipe\x1e\n' +
  'bbb222|Bob|2024-04-20|Fix scheduler bug|\x1e\n' +
  'broken record without pipes\x1e'

const MEM_C = '/** Maps a page on first touch */\nint map_page(void *addr)\n{\n}\n'

function mockGit(_file: string, args: readonly string[] = []): string {
  if (args[0] === 'log') return LOG
  if (args[0] === 'show' && args[1] === '--name-only') {
    return args[3] === 'aaa111' ? 'README.md\nkernel/mem.c\n' : 'kernel/sched.c\n'
  }
  if (args[0] === 'show' && args[1] === 'aaa111:README.md') return '# Readme\n- **Paging**: On demand\n'
  if (args[0] === 'show' && args[1] === 'aaa111:kernel/mem.c') return MEM_C
  throw new Error(`unexpected git ${args.join(' ')}`)
}

// --- mock child_process --------------------------------------------------------

vi.mock('child_process', () => ({
  execFileSync: vi.fn(mockGit),
}))

import { execFileSync } from 'child_process'
import {
  fetchRemoteCommits,
  nextPageUrl,
  parseGitLog,
  readLocalCommits,
  readMarkdownDocs,
  sinceDate,
} from '../collect-sources.js'

let root: string

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'commit-blog-src-'))
  vi.spyOn(console, 'log').mockImplementation(() => {})
  vi.spyOn(console, 'warn').mockImplementation(() => {})
})

afterEach(() => {
  rmSync(root, { recursive: true, force: true })
  vi.mocked(execFileSync).mockClear()
  vi.mocked(execFileSync).mockImplementation(mockGit)
  vi.unstubAllGlobals()
})

// --- Source A ------------------------------------------------------------------

describe('parseGitLog', () => {
  it('splits records and keeps pipes and newlines in the body', () => {
    const commits = parseGitLog(LOG)
    expect(commits).toHaveLength(2)
    expect(commits[0]).toEqual({
      kind: 'commit',
      id: 'aaa111',
      author: 'Ada',
      date: '2024-05-01',
      subject: 'Release 14: paging',
      body: 'Body line one\nBody | with pipe',
      changedFiles: [],
    })
    expect(commits[1].body).toBe('')
  })

  it('drops records with fewer than four fields', () => {
    expect(parseGitLog('a|b|c\x1e')).toEqual([])
  })
})

describe('readLocalCommits', () => {
  it('runs git in the repository directory and attaches changed files', () => {
    mkdirSync(join(root, '.git'))
    const commits = readLocalCommits(root, 30)

    expect(execFileSync).toHaveBeenCalledWith(
      'git',
      ['log', '--since=30 days ago', '--pretty=format:%H|%an|%ad|%s|%b%x1e', '--date=short'],
      expect.objectContaining({ cwd: root }),
    )
    expect(commits.map((c) => c.changedFiles)).toEqual([['README.md', 'kernel/mem.c'], ['kernel/sched.c']])
    expect(commits[0].docSnapshots).toEqual([
      { kind: 'doc', sourcePath: 'README.md', rawText: '# Readme\n- **Paging**: On demand\n' },
    ])
    expect(commits[1].docSnapshots).toEqual([])
    expect(commits[0].sourceSnapshots).toEqual([{ kind: 'doc', sourcePath: 'kernel/mem.c', rawText: MEM_C }])
    expect(commits[1].sourceSnapshots).toEqual([])
  })

  it('returns [] without a .git directory', () => {
    expect(readLocalCommits(root, 30)).toEqual([])
    expect(execFileSync).not.toHaveBeenCalled()
  })

  it('returns [] when git log fails', () => {
    mkdirSync(join(root, '.git'))
    vi.mocked(execFileSync).mockImplementation(() => {
      throw new Error('fatal: not a git repository')
    })
    expect(readLocalCommits(root, 30)).toEqual([])
  })
})

// --- Source B ------------------------------------------------------------------

function ghCommit(sha: string, message: string, author: { name: string; date: string } | null) {
  return { sha, html_url: `https://github.com/octo/demo/commit/${sha}`, commit: { message, author } }
}

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), { status: 200, ...init })
}

describe('nextPageUrl', () => {
  it('finds the rel="next" link', () => {
    const link = '<https://api.github.com/x?page=2>; rel="next", <https://api.github.com/x?page=5>; rel="last"'
    expect(nextPageUrl(link)).toBe('https://api.github.com/x?page=2')
  })

  it('returns null without a next link', () => {
    expect(nextPageUrl('<https://api.github.com/x?page=1>; rel="prev"')).toBeNull()
    expect(nextPageUrl(null)).toBeNull()
  })
})

describe('fetchRemoteCommits', () => {
  const repo = { owner: 'octo', name: 'demo', token: 'test-token' }

  it('follows pagination and maps commits', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(
        jsonResponse([ghCommit('c1', 'Add paging\n\nDetails here', { name: 'Ada', date: '2024-05-01T10:00:00Z' })], {
          headers: { link: '<https://api.github.com/page2>; rel="next"' },
        }),
      )
      .mockResolvedValueOnce(jsonResponse([ghCommit('c2', 'Fix bug', null)]))
    vi.stubGlobal('fetch', fetchMock)

    const commits = await fetchRemoteCommits(repo, '2024-04-01T00:00:00Z')

    expect(fetchMock).toHaveBeenCalledTimes(2)
    expect(fetchMock.mock.calls[0][0]).toBe(
      'https://api.github.com/repos/octo/demo/commits?since=2024-04-01T00%3A00%3A00Z&per_page=100',
    )
    expect(fetchMock.mock.calls[0][1]).toMatchObject({ headers: { Authorization: 'Bearer test-token' } })
    expect(fetchMock.mock.calls[0][1].signal).toBeInstanceOf(AbortSignal)
    expect(fetchMock.mock.calls[1][0]).toBe('https://api.github.com/page2')
    expect(commits).toEqual([
      {
        kind: 'commit',
        id: 'c1',
        author: 'Ada',
        date: '2024-05-01',
        subject: 'Add paging',
        body: 'Details here',
        changedFiles: [],
        sourceUrl: 'https://github.com/octo/demo/commit/c1',
      },
      {
        kind: 'commit',
        id: 'c2',
        author: 'unknown',
        date: '',
        subject: 'Fix bug',
        body: '',
        changedFiles: [],
        sourceUrl: 'https://github.com/octo/demo/commit/c2',
      },
    ])
  })

  it('drops the whole source when a later page fails', async () => {
    vi.stubGlobal(
      'fetch',
      vi
        .fn()
        .mockResolvedValueOnce(
          jsonResponse([ghCommit('c1', 'Add paging', null)], {
            headers: { link: '<https://api.github.com/page2>; rel="next"' },
          }),
        )
        .mockResolvedValueOnce(new Response('boom', { status: 500, statusText: 'Server Error' })),
    )
    await expect(fetchRemoteCommits(repo, '2024-04-01T00:00:00Z')).resolves.toEqual([])
  })

  it('returns [] for a malformed payload', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse([{ foo: 1 }])))
    await expect(fetchRemoteCommits(repo, '2024-04-01T00:00:00Z')).resolves.toEqual([])
  })

  it('returns [] when the network is unreachable', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')))
    await expect(fetchRemoteCommits(repo, '2024-04-01T00:00:00Z')).resolves.toEqual([])
  })
})

describe('sinceDate', () => {
  it('counts back whole days from midnight UTC', () => {
    expect(sinceDate('2024-05-01', 30)).toBe('2024-04-01T00:00:00Z')
  })
})

// --- Source C ------------------------------------------------------------------

describe('readMarkdownDocs', () => {
  it('reads README first, then other documents by path', () => {
    writeFileSync(join(root, 'README.md'), '# Readme')
    writeFileSync(join(root, 'a.md'), '# A')
    writeFileSync(join(root, 'CONTRIBUTING.md'), '# How to contribute')
    writeFileSync(join(root, 'notes.txt'), 'not markdown')
    mkdirSync(join(root, 'docs'))
    writeFileSync(join(root, 'docs', 'b.md'), '# B')
    mkdirSync(join(root, 'node_modules'))
    writeFileSync(join(root, 'node_modules', 'x.md'), '# X')

    expect(readMarkdownDocs(root)).toEqual([
      { kind: 'doc', sourcePath: 'README.md', rawText: '# Readme' },
      { kind: 'doc', sourcePath: 'a.md', rawText: '# A' },
      { kind: 'doc', sourcePath: 'docs/b.md', rawText: '# B' },
    ])
  })

  it('returns [] for a missing directory', () => {
    expect(readMarkdownDocs(join(root, 'missing'))).toEqual([])
  })
})
