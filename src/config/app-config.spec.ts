import { loadConfig } from './app-config'

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    const config = loadConfig({})
    expect(config.port).toBe(3000)
    expect(config.logLevel).toBe('info')
    expect(config.corsOrigin).toBe('*')
    expect(config.auth.accessTokenExpireMinutes).toBe(30)
    expect(config.rateLimit).toEqual({
      enabled: true,
      dailyLimits: { free: 100, pro: 10000, enterprise: 1000000 },
    })
    expect(config.pricing).toEqual({ free: 0, pro: 1900, enterprise: 19900 })
  })

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      RATE_LIMIT_ENABLED: 'false',
      FREE_TIER_DAILY_LIMIT: '5',
      CORS_ORIGIN: 'http://localhost:5173, https://app.example.test',
    })
    expect(config.port).toBe(8080)
    expect(config.rateLimit.enabled).toBe(false)
    expect(config.rateLimit.dailyLimits.free).toBe(5)
    expect(config.corsOrigin).toEqual(['http://localhost:5173', 'https://app.example.test'])
  })

  it('lists every invalid variable', () => {
    expect(() => loadConfig({ PORT: 'abc', RATE_LIMIT_ENABLED: 'maybe' })).toThrow(/PORT: .*RATE_LIMIT_ENABLED: /)
  })
})
