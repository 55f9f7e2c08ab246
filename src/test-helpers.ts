import { InputClosedError } from "./errors"
import type { InputChannel, TextSink } from "./input"

/**
 * Input channel that replays scripted lines, then reports end of input.
 * An Error in the script is thrown by the read that reaches it.
 */
export class ScriptedInput implements InputChannel {
  public closeCount = 0
  private readonly script: (string | Error)[]

  public constructor(script: (string | Error)[]) {
    this.script = [...script]
  }

  public async readLine(): Promise<string> {
    const next = this.script.shift()
    if (next === undefined) {
      throw new InputClosedError()
    }
    if (next instanceof Error) {
      throw next
    }
    return next
  }

  public close(): void {
    this.closeCount++
  }
}

export class OutputBuffer implements TextSink {
  public text = ""

  public write(text: string): void {
    this.text += text
  }
}
