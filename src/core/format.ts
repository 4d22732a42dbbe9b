import { extname } from 'node:path'
import type { ContentFormat } from '../types/deployment-spec'

const TAGS: Readonly<Record<string, ContentFormat>> = {
  text: 'text',
  conf: 'text',
  xml: 'xml',
  set: 'set'
}

/** Map a format tag (text | xml | set, or the alias conf) to a content format. */
export function formatFromTag(tag: string): ContentFormat | undefined {
  return TAGS[tag.trim().toLowerCase()]
}

/** Derive the content format from a file extension; anything unrecognised is plain text. */
export function formatFromPath(path: string): ContentFormat {
  const ext = extname(path).toLowerCase()
  if (ext === '.xml') return 'xml'
  if (ext === '.set') return 'set'
  return 'text'
}
