/** A running external conversion. */
export interface TranscodeProcess {
  /** null while running. */
  readonly exitCode: number | null
  /** Resolves with the exit code; never rejects. */
  wait(): Promise<number>
  /** Request termination (SIGTERM). Does not wait for the exit. */
  terminate(): void
}

export interface TranscodeHandle {
  process: TranscodeProcess
  totalDurationSeconds: number
}

/**
 * Starts a conversion of `variantUrl` into `outputPath`. The progress stream is
 * written to `progressPathFor(outputPath)` and the media playlist to
 * `manifestPathFor(outputPath)`. Rejects with LaunchError when nothing was started.
 */
export interface Transcoder {
  start(variantUrl: string, outputPath: string): Promise<TranscodeHandle>
}
