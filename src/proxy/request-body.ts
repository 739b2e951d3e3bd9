/**
 * Streamed request bodies
 *
 * Each attempt sends a `LazyRequestBody` instead of the inbound request.
 * The wrapper subscribes to the inbound stream on its first read, so a
 * transport that gives up before sending (connection refused, connect
 * timeout) destroys only the wrapper, and the untouched inbound body can
 * still go to the next target.
 */
import { Readable } from 'node:stream'

export class LazyRequestBody extends Readable {
  private attached = false

  constructor(private readonly source: Readable) {
    super()
  }

  override _read(): void {
    if (!this.attached) {
      this.attached = true
      this.source.on('data', this.onData)
      this.source.once('end', this.onEnd)
      this.source.once('error', this.onError)
    }
    this.source.resume()
  }

  override _destroy(
    error: Error | null,
    callback: (error?: Error | null) => void,
  ): void {
    if (this.attached) {
      this.detach()
      this.source.pause()
    }
    callback(error)
  }

  private onData = (chunk: Buffer): void => {
    if (!this.push(chunk)) {
      this.source.pause()
    }
  }

  private onEnd = (): void => {
    this.detach()
    this.push(null)
  }

  private onError = (error: Error): void => {
    this.detach()
    this.destroy(error)
  }

  private detach(): void {
    this.source.off('data', this.onData)
    this.source.off('end', this.onEnd)
    this.source.off('error', this.onError)
  }
}
