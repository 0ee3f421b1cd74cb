import { vi } from 'vitest'

vi.mock('@backend/utils/logger', () => ({
  logger: {
    setLevel: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    satellite: vi.fn(),
    pass: vi.fn(),
    track: vi.fn(),
  },
}))
