import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtemp, rm, writeFile } from 'fs/promises'
import path from 'path'
import os from 'os'
import { loadConfig } from '../../src/config/loader.js'
import { loadConfigFile, saveConfigFile } from '../../src/config/file.js'
import { ConfigurationError } from '../../src/memory/errors.js'
import { AuditLogger } from '../../src/audit/service.js'
import type { AuditEntry } from '../../src/audit/schema.js'

describe('loadConfig', () => {
  let testDir: string
  let configPath: string

  beforeEach(async () => {
    testDir = await mkdtemp(path.join(os.tmpdir(), 'cmem-config-test-'))
    configPath = path.join(testDir, 'config.json')
  })

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true })
  })

  it('returns defaults when no file exists', async () => {
    const config = await loadConfig({ configPath, env: {} })

    expect(config.memory.vector.enabled).toBe(false)
    expect(config.logging.level).toBe('info')
  })

  it('applies the config file', async () => {
    await saveConfigFile(configPath, { memory: { vector: { enabled: true, topK: 4 } } })

    const config = await loadConfig({ configPath, env: {} })

    expect(config.memory.vector.enabled).toBe(true)
    expect(config.memory.vector.topK).toBe(4)
    expect(config.memory.vector.dimensions).toBe(1536)
  })

  it('applies local overrides over the config file', async () => {
    await saveConfigFile(configPath, { memory: { vector: { topK: 4 } } })
    await saveConfigFile(path.join(testDir, 'config.local.json'), {
      memory: { vector: { topK: 6 } },
    })

    const config = await loadConfig({ configPath, env: {} })

    expect(config.memory.vector.topK).toBe(6)
  })

  it('applies env over files and overrides over env', async () => {
    await saveConfigFile(configPath, { logging: { level: 'debug' }, memory: { vector: { topK: 4 } } })

    const config = await loadConfig({
      configPath,
      env: { CMEM_LOGGING__LEVEL: 'warning', CMEM_MEMORY__VECTOR__TOP_K: '7' },
      overrides: { memory: { vector: { topK: 8 } } },
    })

    expect(config.logging.level).toBe('warning')
    expect(config.memory.vector.topK).toBe(8)
  })

  it('records the applied layers under the config category', async () => {
    const entries: AuditEntry[] = []
    const audit = new AuditLogger({
      store: {
        append: async (entry: AuditEntry) => {
          entries.push(entry)
        },
        query: async () => entries,
      },
    })
    await saveConfigFile(configPath, { version: 1 })

    await loadConfig({
      configPath,
      env: { CMEM_LOGGING__LEVEL: 'debug' },
      overrides: { version: 1 },
      audit,
    })

    expect(entries).toHaveLength(1)
    expect(entries[0]).toMatchObject({
      category: 'config',
      action: 'loaded',
      severity: 'info',
      metadata: { configPath, layers: ['defaults', 'file', 'env', 'overrides'] },
    })
  })

  it('loads even when the audit store fails', async () => {
    const audit = new AuditLogger({
      store: {
        append: async () => {
          throw new Error('EACCES audit dir')
        },
        query: async () => [],
      },
    })
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {})

    const config = await loadConfig({ configPath, env: {}, audit })

    expect(config.logging.level).toBe('info')
    expect(consoleError).toHaveBeenCalledTimes(1)
    consoleError.mockRestore()
  })

  it('rejects values the schema does not accept', async () => {
    await expect(
      loadConfig({ configPath, env: { CMEM_MEMORY__VECTOR__TOP_K: '0' } })
    ).rejects.toThrow()
  })
})

describe('loadConfigFile', () => {
  let testDir: string

  beforeEach(async () => {
    testDir = await mkdtemp(path.join(os.tmpdir(), 'cmem-config-file-'))
  })

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true })
  })

  it('rejects invalid JSON', async () => {
    const file = path.join(testDir, 'broken.json')
    await writeFile(file, '{ not json', 'utf-8')

    await expect(loadConfigFile(file)).rejects.toBeInstanceOf(ConfigurationError)
  })

  it('rejects a top-level array', async () => {
    const file = path.join(testDir, 'array.json')
    await writeFile(file, '[1, 2]', 'utf-8')

    await expect(loadConfigFile(file)).rejects.toThrow(`Config file ${file} must contain a JSON object`)
  })

  it('round-trips a saved file', async () => {
    const file = path.join(testDir, 'nested', 'config.json')
    await saveConfigFile(file, { version: 1 })

    expect(await loadConfigFile(file)).toEqual({ version: 1 })
  })
})
