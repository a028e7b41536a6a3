import { describe, expect, it } from 'vitest'
import { NotAvailableError, ResolutionError } from '../lib/errors'
import { CatalogSourceResolver } from './source'

function resolverFor(body: unknown) {
  const urls: string[] = []
  const resolver = new CatalogSourceResolver('http://catalog.test', async (url) => {
    urls.push(url)
    return body
  })
  return { resolver, urls }
}

describe('CatalogSourceResolver', () => {
  it('returns the playlist and image of the requested language', async () => {
    const { resolver, urls } = resolverFor({
      success: true,
      data: {
        vostfr: { videoUri: 'https://cdn.test/42/3/master.m3u8', url_image: 'https://cdn.test/42/poster.jpg' },
        vf: { videoUri: 'https://cdn.test/42/3/vf.m3u8' },
      },
    })

    await expect(resolver.resolve('42', 3, 'vostfr')).resolves.toEqual({
      sourceUrl: 'https://cdn.test/42/3/master.m3u8',
      imageUrl: 'https://cdn.test/42/poster.jpg',
    })
    expect(urls).toEqual(['http://catalog.test/anime/animes/42/3'])
  })

  it('omits a missing image', async () => {
    const { resolver } = resolverFor({ success: true, data: { vf: { videoUri: 'https://cdn.test/vf.m3u8' } } })
    await expect(resolver.resolve('42', 3, 'vf')).resolves.toEqual({
      sourceUrl: 'https://cdn.test/vf.m3u8',
      imageUrl: undefined,
    })
  })

  it('encodes the content id in the path', async () => {
    const { resolver, urls } = resolverFor({ success: true, data: { vf: { videoUri: 'https://cdn.test/vf.m3u8' } } })
    await resolver.resolve('a/b', 0, 'vf')
    expect(urls).toEqual(['http://catalog.test/anime/animes/a%2Fb/0'])
  })

  it('reports a language the episode does not have', async () => {
    const { resolver } = resolverFor({ success: true, data: { vostfr: { videoUri: 'https://cdn.test/m.m3u8' } } })
    const failure = resolver.resolve('42', 3, 'vf')
    await expect(failure).rejects.toBeInstanceOf(NotAvailableError)
    await expect(failure).rejects.toMatchObject({
      statusCode: 404,
      message: 'Language vf is not available for content 42 and episode 3',
    })
  })

  it('passes the catalog message through when the lookup is unsuccessful', async () => {
    const { resolver } = resolverFor({ success: false, message: 'Anime not found' })
    await expect(resolver.resolve('42', 3, 'vf')).rejects.toMatchObject({
      name: 'NotAvailableError',
      message: 'Anime not found',
    })
  })

  it('treats an unexpected body as not found', async () => {
    const { resolver } = resolverFor('oops')
    await expect(resolver.resolve('42', 3, 'vf')).rejects.toMatchObject({ message: 'Episode not found' })
  })

  it('maps a transport failure to a 502', async () => {
    const resolver = new CatalogSourceResolver('http://catalog.test', async () => {
      throw new Error('connect ECONNREFUSED')
    })
    const failure = resolver.resolve('42', 3, 'vf')
    await expect(failure).rejects.toBeInstanceOf(ResolutionError)
    await expect(failure).rejects.toMatchObject({
      statusCode: 502,
      message: 'Source lookup failed: connect ECONNREFUSED',
    })
  })
})
