/**
 * Mutable handle to the loop's run flag. A handler that declares a
 * `runFlag` parameter receives the session's handle and may stop the loop
 * through it; the engine reads it back after the handler returns.
 */
export class RunFlag {
  public constructor(private running = true) {}

  public get value(): boolean {
    return this.running
  }

  public set(running: boolean): void {
    this.running = running
  }

  public stop(): void {
    this.running = false
  }
}
