// ─── Raw records (one variant per source kind) ─────────────────────────────────

export interface DocRecord {
  kind: 'doc'
  sourcePath: string
  rawText: string
}

export interface CommitRecord {
  kind: 'commit'
  id: string
  author: string
  date: string        // YYYY-MM-DD
  subject: string
  body: string
  changedFiles: string[]
  sourceUrl?: string
  docSnapshots?: DocRecord[]     // changed .md files as of this commit (local git only)
  sourceSnapshots?: DocRecord[]  // changed .c/.h files as of this commit (local git only)
}

export interface RenderedPostRecord {
  kind: 'rendered'
  filePath: string
  rawHtml: string
}

export type RawRecord = CommitRecord | DocRecord | RenderedPostRecord

// ─── Canonical post ────────────────────────────────────────────────────────────

export const CATEGORIES = ['release', 'feature', 'fix', 'improvement', 'update'] as const

export type Category = (typeof CATEGORIES)[number]

export interface Feature {
  name: string
  description: string
}

export type Provenance =
  | {
      kind: 'commit'
      id: string
      author: string
      message: string
      url?: string
      changedFiles: string[]
    }
  | { kind: 'doc'; path: string }
  | { kind: 'rendered'; filePath: string }

export interface PostRecord {
  title: string
  date: string           // YYYY-MM-DD
  dateInferred: boolean  // true when the date fell back to the run date
  category: Category
  version: string | null
  features: Feature[]
  changes: string[]
  tags: string[]
  excerpt: string
  sourceRef: string
  slug: string
  provenance: Provenance
}

export interface Classification {
  isSignificant: boolean
  category: Category
}

export interface ExtractOptions {
  projectName: string
  now: string            // YYYY-MM-DD, the run date
}
