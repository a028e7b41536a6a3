import { describe, expect, it } from 'vitest'
import { InvalidManifestError } from '../lib/errors'
import {
  HlsVariantEnumerator,
  absolutizePlaylist,
  parseMasterPlaylist,
  playlistDuration,
  selectVariant,
} from './manifest'
import type { Variant } from './manifest'

const MASTER = [
  '#EXTM3U',
  '#EXT-X-VERSION:3',
  '#EXT-X-STREAM-INF:BANDWIDTH=800000,RESOLUTION=640x360',
  '360/index.m3u8',
  '#EXT-X-STREAM-INF:BANDWIDTH=2800000,RESOLUTION=1280x720',
  'https://other.test/720.m3u8',
  '#EXT-X-STREAM-INF:BANDWIDTH=5000000,RESOLUTION=1920x1080',
  '../hd/1080.m3u8',
  '#EXT-X-STREAM-INF:BANDWIDTH=64000,CODECS="mp4a.40.2"',
  'audio.m3u8',
].join('\n')

const BASE = 'https://cdn.test/show/master.m3u8'

const variant = (height: number, url = `${height}.m3u8`): Variant => ({ url, width: Math.round((height * 16) / 9), height })

describe('parseMasterPlaylist', () => {
  it('lists variants with resolution and absolute URL', () => {
    expect(parseMasterPlaylist(MASTER, BASE)).toEqual([
      { url: 'https://cdn.test/show/360/index.m3u8', width: 640, height: 360 },
      { url: 'https://other.test/720.m3u8', width: 1280, height: 720 },
      { url: 'https://cdn.test/hd/1080.m3u8', width: 1920, height: 1080 },
    ])
  })

  it('handles CRLF line endings', () => {
    const variants = parseMasterPlaylist(MASTER.replace(/\n/g, '\r\n'), BASE)
    expect(variants.map((v) => v.height)).toEqual([360, 720, 1080])
  })

  it('rejects a document that is not a playlist', () => {
    expect(() => parseMasterPlaylist('<html></html>', BASE)).toThrow(new InvalidManifestError('Not a m3u8 file'))
  })

  it('returns nothing for a playlist without variants', () => {
    expect(parseMasterPlaylist('#EXTM3U\n#EXTINF:10,\nseg.ts\n', BASE)).toEqual([])
  })
})

describe('selectVariant', () => {
  const variants = [variant(1080), variant(360), variant(720), variant(480)]

  it('picks by tier over ascending resolution', () => {
    expect(selectVariant(variants, 'low').height).toBe(360)
    expect(selectVariant(variants, 'medium').height).toBe(720)
    expect(selectVariant(variants, 'high').height).toBe(1080)
  })

  it('picks the middle of an odd-sized list for medium', () => {
    expect(selectVariant([variant(1080), variant(360), variant(720)], 'medium').height).toBe(720)
  })

  it('keeps document order between equal resolutions', () => {
    const first = variant(720, 'a.m3u8')
    const second = variant(720, 'b.m3u8')
    expect(selectVariant([first, second], 'low')).toBe(first)
    expect(selectVariant([first, second], 'high')).toBe(second)
  })

  it('returns the only variant for every tier', () => {
    const only = variant(480)
    expect(selectVariant([only], 'low')).toBe(only)
    expect(selectVariant([only], 'medium')).toBe(only)
    expect(selectVariant([only], 'high')).toBe(only)
  })

  it('fails on an empty list', () => {
    expect(() => selectVariant([], 'high')).toThrow(InvalidManifestError)
  })
})

describe('media playlists', () => {
  it('sums the segment durations', () => {
    const text = '#EXTM3U\n#EXTINF:10.0,\nseg0.ts\n#EXTINF:9.5,\nseg1.ts\n#EXTINF:4.25,\nseg2.ts\n#EXT-X-ENDLIST\n'
    expect(playlistDuration(text)).toBe(23.75)
  })

  it('rewrites relative segment and key URIs', () => {
    const text = [
      '#EXTM3U',
      '#EXT-X-KEY:METHOD=AES-128,URI="key.bin"',
      '#EXTINF:10,',
      'seg0.ts',
      '',
      'https://x.test/seg1.ts',
    ].join('\n')
    expect(absolutizePlaylist(text, 'https://cdn.test/a/index.m3u8')).toBe(
      [
        '#EXTM3U',
        '#EXT-X-KEY:METHOD=AES-128,URI="https://cdn.test/a/key.bin"',
        '#EXTINF:10,',
        'https://cdn.test/a/seg0.ts',
        '',
        'https://x.test/seg1.ts',
      ].join('\n')
    )
  })
})

describe('HlsVariantEnumerator', () => {
  it('fetches and parses the master playlist', async () => {
    const fetched: string[] = []
    const enumerator = new HlsVariantEnumerator(async (url) => {
      fetched.push(url)
      return MASTER
    })
    const variants = await enumerator.listVariants(BASE)
    expect(fetched).toEqual([BASE])
    expect(variants).toHaveLength(3)
  })

  it('reports a failed fetch as an invalid manifest', async () => {
    const enumerator = new HlsVariantEnumerator(async () => {
      throw new Error('GET https://cdn.test/show/master.m3u8 failed: 403')
    })
    await expect(enumerator.listVariants(BASE)).rejects.toMatchObject({
      name: 'InvalidManifestError',
      statusCode: 502,
      message: 'Could not fetch playlist: GET https://cdn.test/show/master.m3u8 failed: 403',
    })
  })
})
