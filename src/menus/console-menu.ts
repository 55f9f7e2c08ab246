import { Logger } from "commandkit"
import { PROMPT_MARKER } from "../constants"
import { discoverHandlers } from "../discovery"
import { InputClosedError, MenuError, reportError } from "../errors"
import { type InputChannel, ReadlineInput, type TextSink } from "../input"
import { callHandler, type Option } from "../option"
import { OptionRegistry } from "../registry"
import { createUnderline, renderMenu } from "../renderer"
import { TypedReader } from "../reader"
import { RunFlag } from "../run-flag"
import { clearConsole, type ScreenClearer } from "../screen"
import { resolveSettings } from "../settings"
import type {
  InvocationContext,
  MenuSettings,
  MenuUserSettings,
  NoValue,
  ParsedValue,
  ValueKind,
  ValueOf
} from "../types"

export interface ConsoleMenuOptions {
  /** Behaviour settings, merged over the defaults */
  settings?: MenuUserSettings

  /** Where lines are read from (default: stdin) */
  input?: InputChannel

  /** Where frames and prompts are written (default: stdout) */
  output?: TextSink

  /** Clears the screen before each frame (default: the native clear command) */
  clearScreen?: ScreenClearer
}

/**
 * Base class of an interactive text menu. A subclass tags its methods with
 * `@menuOption` to list them, and optionally one method with
 * `@onUnknownInput` to handle anything else the user types.
 *
 * ```ts
 * class App extends ConsoleMenu {
 *   @menuOption({ name: "Info", pattern: "i" })
 *   info(): void {
 *     console.log("A tiny menu")
 *   }
 *
 *   @menuOption({ name: "Quit", pattern: "q", returns: "boolean" })
 *   quit(): boolean {
 *     return true
 *   }
 * }
 *
 * await new App("MY COOL CLI APP").run()
 * ```
 *
 * A handler stops the loop by returning `true` (declared with
 * `returns: "boolean"`), or by calling `stop()` on the RunFlag it receives
 * when it declares a `runFlag` parameter.
 */
export abstract class ConsoleMenu {
  protected readonly title: string
  protected readonly settings: MenuSettings
  protected readonly output: TextSink
  protected readonly reader: TypedReader

  private readonly registry: OptionRegistry
  private readonly underline: string
  private readonly clearScreen: ScreenClearer
  private readonly input: InputChannel
  private running = false
  private disposed = false

  public constructor(title: string, options: ConsoleMenuOptions = {}) {
    // Only handlers declared on the concrete subclass are options
    const handlers = discoverHandlers(new.target.prototype)

    this.title = title
    this.settings = resolveSettings(options.settings)
    this.registry = new OptionRegistry(this.settings.duplicatePatterns)

    for (const option of handlers.options) {
      this.registry.add(option)
    }
    if (handlers.fallback) {
      this.registry.setFallback(handlers.fallback)
    }

    this.underline = createUnderline(title)
    this.output = options.output ?? process.stdout
    this.clearScreen = options.clearScreen ?? (() => clearConsole())

    // Acquired last, nothing above may leave it open
    this.input = options.input ?? new ReadlineInput()
    this.reader = new TypedReader(this.input, this.output)
  }

  /**
   * Clear the console output
   */
  public static clear(): Promise<void> {
    return clearConsole()
  }

  /**
   * Number of options in the menu
   */
  public get size(): number {
    return this.registry.size
  }

  /**
   * Options in render order
   */
  public get options(): Option[] {
    return this.registry.getAll()
  }

  /**
   * Append an option
   */
  public add(option: Option): void {
    this.registry.add(option)
  }

  /**
   * Remove an option by value or position. Returns the removed option.
   */
  public remove(option: Option | number): Option | undefined {
    return this.registry.remove(option)
  }

  /**
   * Get the option at a position
   */
  public get(index: number): Option | undefined {
    return this.registry.get(index)
  }

  /**
   * Draw the menu, read a selection and dispatch it until a handler
   * stops the loop or input ends. Releases the input channel on exit.
   */
  public async run(): Promise<void> {
    if (this.disposed) {
      throw new MenuError("Menu has been disposed")
    }
    if (this.running) {
      throw new MenuError("Menu is already running")
    }

    this.running = true
    const runFlag = new RunFlag(true)

    try {
      while (runFlag.value) {
        try {
          await this.render()
          const selection = await this.reader.read("text", PROMPT_MARKER)
          await this.dispatch(selection, { runFlag, input: this.input })
        } catch (error) {
          if (error instanceof InputClosedError) {
            Logger.debug("Input closed, stopping menu")
            runFlag.stop()
            break
          }

          reportError(error, this.constructor.name)
          if (!(await this.pause())) {
            runFlag.stop()
          }
        }
      }
    } finally {
      this.running = false
      this.dispose()
    }
  }

  /**
   * Release the input channel. Safe to call more than once.
   */
  public dispose(): void {
    if (this.disposed) {
      return
    }

    this.disposed = true
    this.input.close()
  }

  /**
   * Read a line from the user as the given kind, writing `prompt` first.
   * Malformed input yields `{ kind: "none" }`.
   */
  protected read<K extends ValueKind>(
    kind: K,
    prompt?: string
  ): Promise<ValueOf<K> | NoValue>
  protected read(kind: string, prompt?: string): Promise<ParsedValue>
  protected read(kind: string, prompt?: string): Promise<ParsedValue> {
    return this.reader.read(kind, prompt)
  }

  private async render(): Promise<void> {
    if (this.settings.clearScreen) {
      try {
        await this.clearScreen()
      } catch (error) {
        // A failed clear still gets a frame
        reportError(error, "screen")
      }
    }

    this.output.write(
      renderMenu(this.title, this.registry.getAll(), this.underline)
    )
  }

  private async dispatch(
    selection: ParsedValue,
    context: InvocationContext
  ): Promise<void> {
    const pattern = selection.kind === "text" ? selection.value : ""
    const option = pattern === "" ? undefined : this.registry.match(pattern)

    if (!option) {
      const fallback = this.registry.getFallback()
      if (fallback) {
        await callHandler(
          fallback.handler,
          this,
          [],
          `Unknown input handler "${fallback.key}"`
        )
      }
      return
    }

    const outcome = await option.invoke(this, context)
    if (outcome.kind === "signal") {
      // The flag means "keep running", a handler returns "stop"
      context.runFlag.set(!outcome.stop)
    }
  }

  /**
   * Wait for the user after an error, when configured. Returns false when
   * input ended while waiting.
   */
  private async pause(): Promise<boolean> {
    if (!this.settings.pauseOnError) {
      return true
    }

    this.output.write(`${this.settings.messages.pause}\n`)
    try {
      await this.input.readLine()
      return true
    } catch (error) {
      if (error instanceof InputClosedError) {
        return false
      }
      reportError(error, "pause")
      return true
    }
  }
}
