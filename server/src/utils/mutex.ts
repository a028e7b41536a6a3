/**
 * Promise-chain mutex: callbacks run one at a time in call order.
 * A rejected callback does not block the ones queued after it.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve()

  runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn)
    this.tail = run.then(
      () => undefined,
      () => undefined
    )
    return run
  }
}
