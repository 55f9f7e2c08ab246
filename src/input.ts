import { createInterface, type Interface } from "node:readline"
import { InputClosedError, IOFailure } from "./errors"

/**
 * Line-oriented input the menu reads from
 */
export interface InputChannel {
  /**
   * Wait for the next line, without its line terminator.
   * Rejects with InputClosedError at end of input.
   */
  readLine(): Promise<string>

  /**
   * Release the underlying stream. Safe to call more than once.
   */
  close(): void
}

/**
 * Where prompts and frames are written
 */
export interface TextSink {
  write(text: string): unknown
}

/**
 * Input channel over a readable stream (stdin by default)
 */
export class ReadlineInput implements InputChannel {
  private readonly rl: Interface
  private readonly lines: AsyncIterator<string>
  private closed = false

  public constructor(input: NodeJS.ReadableStream = process.stdin) {
    this.rl = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY })
    // The iterator buffers lines that arrive while nobody is waiting
    this.lines = this.rl[Symbol.asyncIterator]()
  }

  public async readLine(): Promise<string> {
    if (this.closed) {
      throw new InputClosedError()
    }

    let next: IteratorResult<string>
    try {
      next = await this.lines.next()
    } catch (error) {
      throw new IOFailure("Failed to read from input", { cause: error })
    }

    if (next.done) {
      this.close()
      throw new InputClosedError()
    }

    return next.value
  }

  public close(): void {
    if (this.closed) {
      return
    }

    this.closed = true
    this.rl.close()
  }
}
