/**
 * HLS playlists: enumerate the variants of a master playlist, pick one by
 * quality tier, and measure a media playlist.
 */
import { InvalidManifestError, errorMessage } from '../lib/errors'
import type { Quality } from '../models/Job'

export interface Variant {
  url: string
  width: number
  height: number
}

export interface VariantEnumerator {
  listVariants(sourceUrl: string): Promise<Variant[]>
}

const STREAM_INF_RESOLUTION = /^#EXT-X-STREAM-INF:.*RESOLUTION=(\d+)x(\d+)/
const EXTINF = /^#EXTINF:([\d.]+)/

/** GET a text document; non-2xx answers become errors. */
export async function fetchText(url: string): Promise<string> {
  const response = await fetch(url)
  if (!response.ok) {
    throw new Error(`GET ${url} failed: ${response.status}`)
  }
  return response.text()
}

function resolveUri(uri: string, baseUrl: string): string {
  try {
    return new URL(uri, baseUrl).toString()
  } catch {
    return uri
  }
}

/**
 * Variants of a master playlist, in document order. Each `#EXT-X-STREAM-INF`
 * carrying a RESOLUTION is paired with the next URI line.
 */
export function parseMasterPlaylist(text: string, baseUrl: string): Variant[] {
  if (!text.startsWith('#EXTM3U')) {
    throw new InvalidManifestError('Not a m3u8 file')
  }
  const lines = text.split(/\r?\n/).map((line) => line.trim())
  const variants: Variant[] = []
  for (let i = 1; i < lines.length; i++) {
    const match = STREAM_INF_RESOLUTION.exec(lines[i])
    if (!match) continue
    let j = i + 1
    while (j < lines.length && (lines[j] === '' || lines[j].startsWith('#'))) j++
    if (j >= lines.length) break
    variants.push({ url: resolveUri(lines[j], baseUrl), width: Number(match[1]), height: Number(match[2]) })
    i = j
  }
  return variants
}

/**
 * Sort ascending by resolution (stable; equal resolutions keep their order) and
 * pick by index: low = first, high = last, medium = floor(n / 2).
 */
export function selectVariant(variants: readonly Variant[], quality: Quality): Variant {
  if (variants.length === 0) {
    throw new InvalidManifestError('Playlist lists no variant')
  }
  const sorted = [...variants].sort((a, b) => a.height - b.height || a.width - b.width)
  switch (quality) {
    case 'low':
      return sorted[0]
    case 'high':
      return sorted[sorted.length - 1]
    case 'medium':
      return sorted[Math.floor(sorted.length / 2)]
  }
}

/** Sum of the `#EXTINF` segment durations, in seconds. */
export function playlistDuration(text: string): number {
  let total = 0
  for (const line of text.split(/\r?\n/)) {
    const match = EXTINF.exec(line.trim())
    if (match) total += Number(match[1]) || 0
  }
  return total
}

/** Rewrite relative segment and key URIs so the playlist can be read from disk. */
export function absolutizePlaylist(text: string, baseUrl: string): string {
  return text
    .split(/\r?\n/)
    .map((line) => {
      const trimmed = line.trim()
      if (trimmed === '') return line
      if (trimmed.startsWith('#')) {
        return line.replace(/URI="([^"]+)"/g, (_match, uri: string) => `URI="${resolveUri(uri, baseUrl)}"`)
      }
      return resolveUri(trimmed, baseUrl)
    })
    .join('\n')
}

export class HlsVariantEnumerator implements VariantEnumerator {
  constructor(private readonly fetchPlaylist: (url: string) => Promise<string> = fetchText) {}

  async listVariants(sourceUrl: string): Promise<Variant[]> {
    let text: string
    try {
      text = await this.fetchPlaylist(sourceUrl)
    } catch (err) {
      throw new InvalidManifestError(`Could not fetch playlist: ${errorMessage(err)}`)
    }
    return parseMasterPlaylist(text, sourceUrl)
  }
}
