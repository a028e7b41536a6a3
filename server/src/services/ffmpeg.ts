import ffmpeg from 'fluent-ffmpeg'
import ffmpegInstaller from '@ffmpeg-installer/ffmpeg'
import fs from 'fs'
import type pino from 'pino'
import { LaunchError, errorMessage } from '../lib/errors'
import { getLogger, redactFilePath } from '../lib/logger'
import { manifestPathFor, progressPathFor } from '../utils/scratchDir'
import { absolutizePlaylist, fetchText, playlistDuration } from './manifest'
import type { TranscodeHandle, TranscodeProcess, Transcoder } from './transcoder'

// Explicit path: use env in Docker (e.g. /usr/bin/ffmpeg) if the file exists, else the npm installer binary
function resolveFfmpegPath(envPath: string | undefined, fallback: string): string {
  if (envPath && fs.existsSync(envPath)) return envPath
  return fallback
}
ffmpeg.setFfmpegPath(resolveFfmpegPath(process.env.FFMPEG_PATH, ffmpegInstaller.path))

/** fluent-ffmpeg reports "ffmpeg exited with code N: …"; a kill has no code. */
export function exitCodeFromError(err: Error): number {
  const match = /exited with code (\d+)/.exec(err.message)
  const code = match ? Number(match[1]) : 1
  return code === 0 ? 1 : code
}

/**
 * Remux the downloaded media playlist into an MP4 without re-encoding, with
 * key=value progress written to `progressPath`. Resolves once ffmpeg is spawned.
 */
function launchFfmpeg(
  manifestPath: string,
  outputPath: string,
  progressPath: string,
  log: pino.Logger
): Promise<TranscodeProcess> {
  return new Promise((resolve, reject) => {
    let started = false
    let exitCode: number | null = null
    let resolveExit: (code: number) => void = () => undefined
    const exited = new Promise<number>((res) => {
      resolveExit = res
    })
    const settle = (code: number) => {
      if (exitCode !== null) return
      exitCode = code
      resolveExit(code)
    }

    const cmd = ffmpeg(manifestPath)
      .inputOptions(['-protocol_whitelist', 'file,http,https,tcp,tls,crypto'])
      .outputOptions(['-progress', progressPath, '-bsf:a', 'aac_adtstoasc', '-c', 'copy'])
      .on('start', (commandLine: string) => {
        started = true
        log.debug({ msg: 'ffmpeg started', commandLine })
        resolve(handle)
      })
      .on('end', () => settle(0))
      .on('error', (err: Error) => {
        if (!started) {
          reject(new LaunchError(`Could not start ffmpeg: ${err.message}`))
          return
        }
        const code = exitCodeFromError(err)
        log.warn({ msg: 'ffmpeg failed', code, error: err.message })
        settle(code)
      })

    const handle: TranscodeProcess = {
      get exitCode() {
        return exitCode
      },
      wait: () => exited,
      terminate: () => {
        if (exitCode !== null) return
        try {
          cmd.kill('SIGTERM')
        } catch (err) {
          log.warn({ msg: 'Could not signal ffmpeg', err })
        }
      },
    }

    cmd.save(outputPath)
  })
}

export class FfmpegTranscoder implements Transcoder {
  constructor(
    private readonly fetchPlaylist: (url: string) => Promise<string> = fetchText,
    private readonly log: pino.Logger = getLogger('jobs')
  ) {}

  async start(variantUrl: string, outputPath: string): Promise<TranscodeHandle> {
    const manifestPath = manifestPathFor(outputPath)
    let playlist: string
    try {
      playlist = await this.fetchPlaylist(variantUrl)
      await fs.promises.writeFile(manifestPath, absolutizePlaylist(playlist, variantUrl), 'utf-8')
    } catch (err) {
      throw new LaunchError(`Could not prepare media playlist: ${errorMessage(err)}`)
    }
    const totalDurationSeconds = playlistDuration(playlist)
    const transcodeProcess = await launchFfmpeg(manifestPath, outputPath, progressPathFor(outputPath), this.log)
    this.log.info({
      msg: 'Transcoder launched',
      output: redactFilePath(outputPath),
      totalDurationSeconds,
    })
    return { process: transcodeProcess, totalDurationSeconds }
  }
}
