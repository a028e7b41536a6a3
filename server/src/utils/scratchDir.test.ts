import fs from 'fs'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { makeTempDir, removeTempDir } from '../test/helpers'
import { fileSize, jobPaths, prepareScratchDir, removeFile } from './scratchDir'

describe('jobPaths', () => {
  it('names every file after the job id', () => {
    expect(jobPaths('/scratch', 'abc')).toEqual({
      artifact: path.join('/scratch', 'abc.mp4'),
      manifest: path.join('/scratch', 'abc.m3u8'),
      progress: path.join('/scratch', 'abc-progress.txt'),
    })
  })
})

describe('scratch files', () => {
  let dir: string

  beforeEach(() => {
    dir = makeTempDir()
  })

  afterEach(() => {
    removeTempDir(dir)
  })

  it('creates the directory and clears leftovers', async () => {
    const scratch = path.join(dir, 'tmp')
    await expect(prepareScratchDir(scratch)).resolves.toBe(0)

    fs.writeFileSync(path.join(scratch, 'old.mp4'), 'x')
    fs.mkdirSync(path.join(scratch, 'nested'))
    fs.writeFileSync(path.join(scratch, 'nested', 'f'), 'x')

    await expect(prepareScratchDir(scratch)).resolves.toBe(2)
    expect(fs.readdirSync(scratch)).toEqual([])
  })

  it('measures missing files as empty', async () => {
    const file = path.join(dir, 'a.mp4')
    await expect(fileSize(file)).resolves.toBe(0)
    fs.writeFileSync(file, Buffer.alloc(7))
    await expect(fileSize(file)).resolves.toBe(7)
  })

  it('removes files and ignores missing ones', async () => {
    const file = path.join(dir, 'a.mp4')
    fs.writeFileSync(file, 'x')
    await removeFile(file)
    await removeFile(file)
    expect(fs.existsSync(file)).toBe(false)
  })
})
