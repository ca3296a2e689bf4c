import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { DEFAULT_CONFIG, findConfigDir, loadConfig } from '../src/config.js'
import { ConfigError } from '../src/errors.js'

function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'calendar-graph-config-'))
}

describe('loadConfig', () => {
  let dir: string

  beforeEach(() => {
    dir = createTempDir()
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
    vi.restoreAllMocks()
  })

  function writeConfig(content: string): void {
    fs.writeFileSync(path.join(dir, 'config.yaml'), content, 'utf-8')
  }

  it('uses defaults without a config file', () => {
    expect(loadConfig({ configDir: dir, env: {} })).toEqual(DEFAULT_CONFIG)
    expect(DEFAULT_CONFIG).toMatchObject({
      objectStoreUrl: 'http://localhost:5000',
      graphLayerUrl: 'http://localhost:5001',
      timezone: 'Europe/Berlin',
      importConcurrency: 1,
      requestTimeoutMs: 10000,
    })
  })

  it('reads config.yaml', () => {
    writeConfig(
      [
        'objectstore:',
        '  url: http://store.test:8080',
        '  token: test-secret',
        'graphlayer:',
        '  url: http://graph.test:8081',
        'timezone: UTC',
        'import:',
        '  concurrency: 4',
        'request:',
        '  timeout_ms: 2500',
      ].join('\n'),
    )

    expect(loadConfig({ configDir: dir, env: {} })).toEqual({
      objectStoreUrl: 'http://store.test:8080',
      objectStoreToken: 'test-secret',
      graphLayerUrl: 'http://graph.test:8081',
      graphToken: '',
      timezone: 'UTC',
      importConcurrency: 4,
      requestTimeoutMs: 2500,
    })
  })

  it('lets the environment override the file and overrides win over both', () => {
    writeConfig('graphlayer:\n  url: http://graph.test:8081\n  token: file-token\n')

    const config = loadConfig({
      configDir: dir,
      env: {
        CALENDAR_GRAPH_GRAPHLAYER_URL: 'http://graph-env.test',
        CALENDAR_GRAPH_TOKEN: 'env-token',
        CALENDAR_GRAPH_TIMEZONE: 'America/New_York',
      },
      overrides: { graphToken: 'cli-token' },
    })

    expect(config.graphLayerUrl).toBe('http://graph-env.test')
    expect(config.graphToken).toBe('cli-token')
    expect(config.timezone).toBe('America/New_York')
  })

  it('finds the config directory through CALENDAR_GRAPH_DIR', () => {
    writeConfig('timezone: Asia/Tokyo\n')
    expect(loadConfig({ env: { CALENDAR_GRAPH_DIR: dir } }).timezone).toBe('Asia/Tokyo')
  })

  it('warns about an unparseable file and falls back to defaults', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    writeConfig('timezone: [unclosed\n')

    expect(loadConfig({ configDir: dir, env: {} }).timezone).toBe('Europe/Berlin')
    expect(warn).toHaveBeenCalledTimes(1)
  })

  it('warns about a file with the wrong structure', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    writeConfig('import:\n  concurrency: many\n')

    expect(loadConfig({ configDir: dir, env: {} }).importConcurrency).toBe(1)
    expect(warn).toHaveBeenCalledTimes(1)
  })

  it('rejects invalid values', () => {
    expect(() => loadConfig({ configDir: dir, env: { CALENDAR_GRAPH_TIMEZONE: 'Mars/Olympus' } })).toThrow(
      ConfigError,
    )
    expect(() => loadConfig({ configDir: dir, env: {}, overrides: { importConcurrency: 0 } })).toThrow(
      'importConcurrency must be a positive integer, got 0',
    )
    expect(() =>
      loadConfig({ configDir: dir, env: { CALENDAR_GRAPH_OBJECTSTORE_URL: 'not a url' } }),
    ).toThrow('objectStoreUrl is not a valid URL: not a url')
  })
})

describe('findConfigDir', () => {
  it('walks up to an existing .calendar-graph directory', () => {
    const root = createTempDir()
    try {
      fs.mkdirSync(path.join(root, '.calendar-graph'))
      const nested = path.join(root, 'a', 'b')
      fs.mkdirSync(nested, { recursive: true })

      expect(findConfigDir(nested)).toBe(path.join(root, '.calendar-graph'))
    } finally {
      fs.rmSync(root, { recursive: true, force: true })
    }
  })
})
