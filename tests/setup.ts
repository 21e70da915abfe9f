import { afterEach, vi } from 'vitest'

// Keep user config and tool overrides from leaking into tests.
process.env.HOME = '/nonexistent-home'
delete process.env.SLIDESCRIBE_LOG_LEVEL
delete process.env.SLIDESCRIBE_WORKERS

afterEach(() => {
  vi.unstubAllEnvs()
})
