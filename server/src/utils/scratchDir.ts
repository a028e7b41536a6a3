import fs from 'fs'
import path from 'path'
import type pino from 'pino'
import { getLogger, redactFilePath } from '../lib/logger'

/** Files a job owns in the scratch directory, all named after the job id. */
export interface JobPaths {
  artifact: string
  manifest: string
  progress: string
}

function stem(outputPath: string): string {
  return path.join(path.dirname(outputPath), path.basename(outputPath, path.extname(outputPath)))
}

/** `<dir>/<id>-progress.txt` for `<dir>/<id>.mp4`; ffmpeg's -progress target. */
export function progressPathFor(outputPath: string): string {
  return `${stem(outputPath)}-progress.txt`
}

/** `<dir>/<id>.m3u8` for `<dir>/<id>.mp4`; the downloaded media playlist. */
export function manifestPathFor(outputPath: string): string {
  return `${stem(outputPath)}.m3u8`
}

export function jobPaths(scratchDir: string, id: string): JobPaths {
  const artifact = path.join(scratchDir, `${id}.mp4`)
  return {
    artifact,
    manifest: manifestPathFor(artifact),
    progress: progressPathFor(artifact),
  }
}

/**
 * Create the scratch directory and delete whatever a previous process left in it.
 * Returns the number of deleted entries.
 */
export async function prepareScratchDir(dir: string, log: pino.Logger = getLogger('api')): Promise<number> {
  await fs.promises.mkdir(dir, { recursive: true })
  const entries = await fs.promises.readdir(dir)
  await Promise.all(entries.map((entry) => fs.promises.rm(path.join(dir, entry), { recursive: true, force: true })))
  if (entries.length > 0) {
    log.info({ msg: 'Scratch directory cleaned', dir, deleted: entries.length })
  }
  return entries.length
}

/** Delete a file; a missing file counts as deleted, other failures are logged. */
export async function removeFile(filePath: string, log: pino.Logger = getLogger('jobs')): Promise<void> {
  try {
    await fs.promises.rm(filePath, { force: true })
  } catch (err) {
    log.warn({ msg: 'Could not delete scratch file', file: redactFilePath(filePath), err })
  }
}

/** Bytes on disk, 0 when the file does not exist (yet). */
export async function fileSize(filePath: string): Promise<number> {
  try {
    const stats = await fs.promises.stat(filePath)
    return stats.size
  } catch (err) {
    if (isErrnoCode(err, 'ENOENT')) return 0
    throw err
  }
}

export function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code
}
