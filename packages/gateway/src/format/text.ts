const pad = (value: number) => String(value).padStart(2, '0')

/** `HH:MM` in local time */
export function formatTimestamp(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}`
}

/** `YYYY-MM-DD HH:MM:SS` in local time */
export function formatDateTime(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
  return `${day} ${formatTimestamp(date)}:${pad(date.getSeconds())}`
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
}

/**
 * Escape markup and tidy line breaks for display.
 */
export function sanitizeText(text: string): string {
  if (!text) {
    return ''
  }
  return text
    .replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char)
    .replace(/\r\n?/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
}

export function truncateText(text: string, maxLength = 1000): string {
  if (text.length <= maxLength) {
    return text
  }
  return `${text.slice(0, maxLength - 3)}...`
}

export interface CodeBlock {
  language: string
  code: string
  fullMatch: string
}

/** Fenced code blocks in a markdown reply; the language defaults to `text`. */
export function extractCodeBlocks(text: string): CodeBlock[] {
  const blocks: CodeBlock[] = []
  for (const match of text.matchAll(/```(\w+)?\n([\s\S]*?)\n```/g)) {
    blocks.push({
      language: match[1] ?? 'text',
      code: match[2] ?? '',
      fullMatch: match[0],
    })
  }
  return blocks
}

export function isValidServerUrl(value: string): boolean {
  let url: URL
  try {
    url = new URL(value)
  } catch {
    return false
  }
  return (url.protocol === 'http:' || url.protocol === 'https:') && url.hostname !== ''
}
