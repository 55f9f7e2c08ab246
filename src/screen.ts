import { execa } from "execa"
import { IOFailure } from "./errors"

/**
 * Clears the terminal and resolves once it is clear
 */
export type ScreenClearer = () => Promise<void>

/**
 * Clear the console with the platform's native command (`cls` on Windows,
 * `clear` elsewhere), waiting for the process to exit.
 */
export async function clearConsole(
  platform: NodeJS.Platform = process.platform
): Promise<void> {
  const command = platform === "win32" ? "cmd" : "clear"
  const args = platform === "win32" ? ["/c", "cls"] : []

  let exitCode: number | undefined
  try {
    const result = await execa(command, args, {
      stdio: "inherit",
      reject: false
    })
    exitCode = result.exitCode
  } catch (error) {
    throw new IOFailure(`Failed to run "${command}"`, { cause: error })
  }

  if (exitCode !== 0) {
    throw new IOFailure(`"${command}" exited with code ${exitCode ?? "unknown"}`)
  }
}
