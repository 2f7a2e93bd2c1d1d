import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import path from 'path'
import {
  getHome,
  getConfigPath,
  getLocalConfigPath,
  getVectorStorePath,
  getLogsPath,
  getAuditPath,
} from '../../src/config/paths.js'

describe('getHome', () => {
  const originalEnv = { ...process.env }

  beforeEach(() => {
    delete process.env.CMEM_HOME
    delete process.env.XDG_CONFIG_HOME
  })

  afterEach(() => {
    process.env = { ...originalEnv }
  })

  it('returns CMEM_HOME when set', () => {
    process.env.CMEM_HOME = '/custom/cmem'
    expect(getHome()).toBe('/custom/cmem')
  })

  it('returns XDG_CONFIG_HOME/composable-memory when set', () => {
    process.env.XDG_CONFIG_HOME = '/home/user/.config'
    expect(getHome()).toBe(path.join('/home/user/.config', 'composable-memory'))
  })

  it('returns platform default when no env vars set', () => {
    expect(getHome()).toContain('composable-memory')
  })
})

describe('derived paths', () => {
  const originalEnv = { ...process.env }

  beforeEach(() => {
    process.env.CMEM_HOME = '/test/home'
  })

  afterEach(() => {
    process.env = { ...originalEnv }
  })

  it('places files under the home directory', () => {
    expect(getConfigPath()).toBe(path.join('/test/home', 'config.json'))
    expect(getLocalConfigPath()).toBe(path.join('/test/home', 'config.local.json'))
    expect(getVectorStorePath()).toBe(path.join('/test/home', 'memory.db'))
    expect(getLogsPath()).toBe(path.join('/test/home', 'logs'))
    expect(getAuditPath()).toBe(path.join('/test/home', 'logs', 'audit'))
  })
})
