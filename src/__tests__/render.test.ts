import { describe, it, expect } from 'vitest'
import { buildPostBody, PLACEHOLDERS, renderPost } from '../render.js'
import type { PostRecord } from '../types.js'

const base: PostRecord = {
  title: 'Release 14: new scheduler',
  date: '2024-05-01',
  dateInferred: false,
  category: 'release',
  version: '14',
  features: [{ name: 'Scheduler', description: 'Round-robin with priorities' }],
  changes: [],
  tags: ['Release', 'TestOS', 'Version 14'],
  excerpt: 'Highlights of this release.',
  sourceRef: '0123456789abcdef',
  slug: 'release-14-release-14-new-scheduler.html',
  provenance: {
    kind: 'commit',
    id: '0123456789abcdef',
    author: 'Dev',
    message: 'Release 14: new scheduler',
    url: 'https://example.com/commit/0123456789abcdef',
    changedFiles: ['kernel/sched.c'],
  },
}

const docPost: PostRecord = {
  ...base,
  category: 'feature',
  version: null,
  features: [],
  changes: ['Faster boot'],
  tags: ['Feature', 'TestOS', 'Update'],
  sourceRef: 'docs/shell.md',
  provenance: { kind: 'doc', path: 'docs/shell.md' },
}

const TEMPLATE = [
  'T:BLOG_TITLE',
  'D:MONTH YEAR',
  'G:Tag1, Tag2, Tag3',
  'I:INTRODUCTION_PARAGRAPH',
  'C:<!-- CONTENT_PLACEHOLDER -->',
  '<title>BLOG_TITLE</title>',
].join('\n')

describe('renderPost — substitution', () => {
  it('fills every placeholder, including repeated titles', () => {
    const { html, missing } = renderPost(TEMPLATE, base, 'The intro.', 'TestOS')
    const lines = html.split('\n')
    expect(missing).toEqual([])
    expect(lines[0]).toBe('T:Release 14: new scheduler')
    expect(lines[1]).toBe('D:2024-05-01')
    expect(lines[2]).toBe('G:Release, TestOS, Version 14')
    expect(lines[3]).toBe('I:The intro.')
    expect(html).toContain('<title>Release 14: new scheduler</title>')
    expect(html).not.toContain(PLACEHOLDERS.content)
  })

  it('escapes HTML in substituted text', () => {
    const { html } = renderPost(TEMPLATE, { ...base, title: 'Fix <div> & "quotes"' }, 'a < b', 'TestOS')
    expect(html.split('\n')[0]).toBe('T:Fix &lt;div&gt; &amp; &quot;quotes&quot;')
    expect(html.split('\n')[3]).toBe('I:a &lt; b')
  })

  it('does not re-substitute tokens that appear inside values', () => {
    const { html } = renderPost('BLOG_TITLE / MONTH YEAR', { ...base, title: 'MONTH YEAR recap' }, '', 'TestOS')
    expect(html).toBe('MONTH YEAR recap / 2024-05-01')
  })

  it('reports placeholders the template lacks and leaves the rest filled', () => {
    const { html, missing } = renderPost('<h1>BLOG_TITLE</h1>', base, 'x', 'TestOS')
    expect(html).toBe('<h1>Release 14: new scheduler</h1>')
    expect(missing).toEqual([
      PLACEHOLDERS.date,
      PLACEHOLDERS.tags,
      PLACEHOLDERS.intro,
      PLACEHOLDERS.content,
    ])
  })
})

describe('buildPostBody', () => {
  it('describes a versioned release', () => {
    const body = buildPostBody(base, 'TestOS')
    expect(body).toContain('<p>TestOS Release 14 is a milestone for the project')
    expect(body).toContain('<li><strong>Scheduler:</strong> Round-robin with priorities</li>')
  })

  it('adds commit information and changed files for commits', () => {
    const body = buildPostBody(base, 'TestOS')
    expect(body).toContain('<p><strong>Commit:</strong> <code>0123456789abcdef</code></p>')
    expect(body).toContain('<p><strong>Type:</strong> Release</p>')
    expect(body).toContain('<a href="https://example.com/commit/0123456789abcdef" target="_blank">View commit</a>')
    expect(body).toContain('<li><code>kernel/sched.c</code></li>')
    expect(body).toContain('<p>Extracted from commit <code>0123456789abcdef</code> in the TestOS repository.</p>')
  })

  it('uses the excerpt as overview and lists changes for documents', () => {
    const body = buildPostBody(docPost, 'TestOS')
    expect(body).toContain('<h2>Overview</h2>\n<p>Highlights of this release.</p>')
    expect(body).toContain('<h2>Key Changes</h2>\n<ul>\n<li>Faster boot</li>\n</ul>')
    expect(body).not.toContain('Commit Information')
    expect(body).not.toContain('New Features')
    expect(body).toContain('<p>Extracted from <code>docs/shell.md</code> in the TestOS repository.</p>')
  })
})
