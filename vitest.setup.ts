import { vi } from "vitest"

// Keep test output quiet and let tests assert on reported errors
vi.mock("commandkit", () => ({
  Logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  }
}))
