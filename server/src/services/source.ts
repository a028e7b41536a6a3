import { NotAvailableError, ResolutionError, errorMessage } from '../lib/errors'

export interface ResolvedSource {
  /** Master playlist URL. */
  sourceUrl: string
  imageUrl?: string
}

export interface SourceResolver {
  resolve(contentId: string, episode: number, lang: string): Promise<ResolvedSource>
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Catalog API client. `GET {baseUrl}/anime/animes/{contentId}/{episode}` answers
 * `{ success, message?, data: { [lang]: { videoUri, url_image } } }`.
 */
export class CatalogSourceResolver implements SourceResolver {
  constructor(
    private readonly baseUrl: string,
    private readonly fetchJson: (url: string) => Promise<unknown> = defaultFetchJson
  ) {}

  async resolve(contentId: string, episode: number, lang: string): Promise<ResolvedSource> {
    const url = `${this.baseUrl}/anime/animes/${encodeURIComponent(contentId)}/${episode}`
    let body: unknown
    try {
      body = await this.fetchJson(url)
    } catch (err) {
      throw new ResolutionError(`Source lookup failed: ${errorMessage(err)}`, 502)
    }
    if (!isRecord(body) || body.success !== true) {
      const message = isRecord(body) && typeof body.message === 'string' ? body.message : 'Episode not found'
      throw new NotAvailableError(message)
    }
    const entry = isRecord(body.data) ? body.data[lang] : undefined
    if (!isRecord(entry) || typeof entry.videoUri !== 'string') {
      throw new NotAvailableError(
        `Language ${lang} is not available for content ${contentId} and episode ${episode}`
      )
    }
    return {
      sourceUrl: entry.videoUri,
      imageUrl: typeof entry.url_image === 'string' ? entry.url_image : undefined,
    }
  }
}

async function defaultFetchJson(url: string): Promise<unknown> {
  const response = await fetch(url, { headers: { Accept: 'application/json' } })
  if (response.status >= 500) {
    throw new Error(`GET ${url} failed: ${response.status}`)
  }
  const body: unknown = await response.json()
  return body
}
