import { DEFAULT_BALLPARK } from '@/domain/ballpark'
import { DEFAULT_STEAL_MODEL, createSimConfig } from '@/domain/config'

describe('createSimConfig', () => {
  it('fills in defaults', () => {
    const config = createSimConfig()

    expect(config.steal).toEqual(DEFAULT_STEAL_MODEL)
    expect(config.ballpark).toBe(DEFAULT_BALLPARK)
    expect(config.logger).toBe(console)
  })

  it('merges partial steal overrides', () => {
    expect(createSimConfig({ steal: { attemptThreshold: 0.1 } }).steal).toEqual({
      attemptThreshold: 0.1,
      successThreshold: 0.5,
    })
  })

  it('turns consistency checks off in production unless asked', () => {
    vi.stubEnv('NODE_ENV', 'production')
    try {
      expect(createSimConfig().consistencyChecks).toBe(false)
      expect(createSimConfig({ consistencyChecks: true }).consistencyChecks).toBe(true)
    } finally {
      vi.unstubAllEnvs()
    }
  })
})
