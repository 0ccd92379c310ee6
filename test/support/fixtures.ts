import { loadConfig, type AppConfig } from '../../src/config/app-config'
import type { AuthUser } from '../../src/auth/auth.types'
import type { NewTrainingHistoryEntry } from '../../src/history/training-history.types'

export const TEST_NOW = new Date('2026-03-10T09:30:00.000Z')

export function testConfig(env: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({
    JWT_SECRET: 'test-secret',
    FREE_TIER_DAILY_LIMIT: '3',
    PRO_TIER_DAILY_LIMIT: '5',
    ENTERPRISE_TIER_DAILY_LIMIT: '10',
    ...env,
  })
}

export const freeUser: AuthUser = { userId: 1, email: 'free@example.test', tier: 'free' }
export const proUser: AuthUser = { userId: 2, email: 'pro@example.test', tier: 'pro' }
export const enterpriseUser: AuthUser = { userId: 3, email: 'ent@example.test', tier: 'enterprise' }

export function historyEntry(overrides: Partial<NewTrainingHistoryEntry> = {}): NewTrainingHistoryEntry {
  return {
    userId: 2,
    muscleGroup: 'chest',
    trainingLevel: 'intermediate',
    currentSets: 12,
    progress: false,
    recovered: true,
    outcome: 'INCREASE_VOLUME',
    targetSets: 15,
    message: 'Increase to at least 15 sets per week (MAV)',
    ...overrides,
  }
}
