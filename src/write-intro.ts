import Anthropic from '@anthropic-ai/sdk'
import type { PostRecord } from './types.js'

const MAX_TOKENS = 400

// ─── Deterministic intro ──────────────────────────────────────────────────────

function featureSentence(post: PostRecord): string | null {
  const n = post.features.length
  if (n === 0) return null

  const noun = post.category === 'release' ? 'release' : 'update'
  const names = post.features.slice(0, 3).map((f) => f.name).join(', ')
  const more = n > 3 ? ` and ${n - 3} more` : ''
  return `This ${noun} introduces ${n} new feature${n === 1 ? '' : 's'}, including ${names}${more}.`
}

export function composeIntro(post: PostRecord, projectName: string): string {
  const parts: string[] = []

  if (post.category === 'release') {
    parts.push(
      post.version
        ? `${projectName} Release ${post.version} is now available.`
        : `A new ${projectName} release is now available.`,
    )
  } else {
    parts.push(`${projectName} development continues with a new ${post.category}.`)
  }

  const features = featureSentence(post)
  if (features) parts.push(features)
  if (post.excerpt && post.excerpt !== post.title) parts.push(post.excerpt)

  return parts.join(' ')
}

// ─── Optional Claude polish ───────────────────────────────────────────────────

const SYSTEM_PROMPT = `You edit the opening paragraph of short release-note blog posts.

Rewrite the draft paragraph you are given so it reads naturally.

Rules:
- At most three sentences, plain text, no markdown, no HTML
- Keep every fact (version numbers, feature names) exactly as given; add no new facts
- Direct and technical; no marketing language, no "exciting"
- Return only the paragraph — no preamble, no quotes`

export function buildIntroPrompt(post: PostRecord, draft: string): string {
  const parts = [
    `Post title: ${post.title}`,
    `Category: ${post.category}${post.version ? ` (version ${post.version})` : ''}`,
  ]
  if (post.features.length > 0) {
    parts.push('Features:')
    post.features.forEach((f) => parts.push(`- ${f.name}: ${f.description}`))
  }
  parts.push('', 'Draft paragraph:', draft)
  return parts.join('\n')
}

/** Claude rewrite of the draft intro; any failure keeps the draft. */
export async function polishIntro(post: PostRecord, draft: string, model: string): Promise<string> {
  try {
    const client = new Anthropic()
    const message = await client.messages.create({
      model,
      max_tokens: MAX_TOKENS,
      system: SYSTEM_PROMPT,
      messages: [{ role: 'user', content: buildIntroPrompt(post, draft) }],
    })

    const block = message.content[0]
    const text = block && block.type === 'text' ? block.text.trim() : ''
    if (!text) {
      console.warn('  ⚠ Empty intro from Claude — keeping the draft')
      return draft
    }
    // Claude occasionally wraps the paragraph in quotes despite instructions
    return text.replace(/^"(.*)"$/s, '$1')
  } catch (err) {
    console.warn(`  ⚠ Intro polish failed: ${err instanceof Error ? err.message : String(err)}`)
    return draft
  }
}
