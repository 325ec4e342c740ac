export function cleanText(value?: string | null): string {
  if (!value) return ''
  let text = value
  text = text.replace(/\[([^\]]+)\]\([^)]*\)/g, '$1')
  text = text.replace(/<(https?:[^>]+)>/gi, '$1')
  text = text.replace(/\s+/g, ' ').replace(/\s+,/g, ',').trim()
  return text
}

/** Lowercase identifier safe for Doxygen labels: `Work Experience` -> `work_experience` */
export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
}

/** Filename-safe token: `Acme Corp.` -> `Acme_Corp` */
export function sanitizeFilenamePart(value: string): string {
  return value
    .trim()
    .replace(/[^A-Za-z0-9]+/g, '_')
    .slice(0, 60)
    .replace(/^_+|_+$/g, '')
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
}
