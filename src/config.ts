import { basename, join, resolve } from 'path'
import { z } from 'zod'

export const SOURCE_KINDS = ['git', 'github', 'markdown'] as const
export type SourceKind = (typeof SOURCE_KINDS)[number]

const DEFAULT_INTRO_MODEL = 'claude-sonnet-4-6'

const commaList = z
  .string()
  .optional()
  .transform((s) => (s ?? '').split(',').map((x) => x.trim()).filter(Boolean))

const flag = z
  .string()
  .optional()
  .transform((s) => s?.trim() === 'true')

const envSchema = z
  .object({
    SOURCE_ROOT: z.string().trim().min(1).default('source'),
    BLOG_DIR: z.string().trim().min(1).default('blog'),
    TEMPLATE_PATH: z.string().trim().min(1).optional(),
    INDEX_PATH: z.string().trim().min(1).default('blog.html'),
    SOURCES: z
      .string()
      .default('git,markdown')
      .transform((s) => s.split(',').map((x) => x.trim()).filter(Boolean))
      .pipe(z.array(z.enum(SOURCE_KINDS)).min(1)),
    DAYS_BACK: z.coerce.number().int().positive().default(30),
    GITHUB_REPO: z
      .string()
      .trim()
      .regex(/^[\w.-]+\/[\w.-]+$/, 'expected owner/name')
      .optional(),
    GITHUB_TOKEN: z.string().optional(),
    PROJECT_NAME: z.string().trim().min(1).optional(),
    DOMAIN_KEYWORDS: commaList,
    DRY_RUN: flag,
    POLISH_INTROS: flag,
    INTRO_MODEL: z.string().trim().min(1).default(DEFAULT_INTRO_MODEL),
    DATE_OVERRIDE: z
      .string()
      .optional()
      .transform((s) => s?.trim().slice(0, 10) || undefined)
      .pipe(z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD').optional()),
  })
  .refine((env) => !env.SOURCES.includes('github') || !!env.GITHUB_REPO, {
    message: 'GITHUB_REPO is required when the github source is enabled',
    path: ['GITHUB_REPO'],
  })

export interface Config {
  sourceRoot: string
  blogDir: string
  templatePath: string
  indexPath: string
  sources: SourceKind[]
  daysBack: number
  githubRepo?: { owner: string; name: string }
  githubToken?: string
  projectName: string
  domainKeywords: string[]
  dryRun: boolean
  polishIntros: boolean
  introModel: string
  date: string
}

function todayUTC(): string {
  return new Date().toISOString().slice(0, 10)
}

/** Reads and validates the environment. Throws a ZodError on invalid values. */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd(),
): Config {
  const e = envSchema.parse(env)
  const sourceRoot = resolve(cwd, e.SOURCE_ROOT)
  const blogDir = resolve(cwd, e.BLOG_DIR)
  const [owner, name] = e.GITHUB_REPO?.split('/') ?? []

  return {
    sourceRoot,
    blogDir,
    templatePath: e.TEMPLATE_PATH ? resolve(cwd, e.TEMPLATE_PATH) : join(blogDir, 'template.html'),
    indexPath: resolve(cwd, e.INDEX_PATH),
    sources: [...new Set(e.SOURCES)],
    daysBack: e.DAYS_BACK,
    githubRepo: owner && name ? { owner, name } : undefined,
    githubToken: e.GITHUB_TOKEN?.trim() || undefined,
    projectName: e.PROJECT_NAME ?? basename(sourceRoot),
    domainKeywords: e.DOMAIN_KEYWORDS,
    dryRun: e.DRY_RUN,
    polishIntros: e.POLISH_INTROS,
    introModel: e.INTRO_MODEL,
    date: e.DATE_OVERRIDE ?? todayUTC(),
  }
}

export function formatConfigError(err: z.ZodError): string {
  return err.issues.map((i) => `${i.path.join('.') || 'env'}: ${i.message}`).join('; ')
}
