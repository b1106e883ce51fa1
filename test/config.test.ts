/**
 * Tests for loadConfig: defaults, config file values, environment overrides
 * and validation.
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { loadConfig } from '../src/main/config'
import { ValidationError } from '../src/main/errors'

describe('loadConfig', () => {
  let tmpDir: string
  let warnSpy: jest.SpyInstance

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'input-counter-config-'))
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true })
    warnSpy.mockRestore()
  })

  function writeConfig(contents: string, dir: string = path.join(tmpDir, 'data')): string {
    fs.mkdirSync(dir, { recursive: true })
    const file = path.join(dir, 'config.json')
    fs.writeFileSync(file, contents, 'utf-8')
    return file
  }

  test('defaults when there is no config file', () => {
    const config = loadConfig({ env: {}, cwd: tmpDir })

    expect(config).toEqual({
      dataDir: path.join(tmpDir, 'data'),
      databaseFile: 'daily_stats.db',
      databasePath: path.join(tmpDir, 'data', 'daily_stats.db'),
      flushIntervalMs: 60000,
      shutdownTimeoutMs: 5000,
      shutdownRetryDelayMs: 250,
      maxBackoffTicks: 8,
      countNumbers: true,
      countSymbols: true,
    })
  })

  test('reads values from <dataDir>/config.json', () => {
    writeConfig(JSON.stringify({ flushIntervalMs: 30000, countSymbols: false }))

    const config = loadConfig({ env: {}, cwd: tmpDir })
    expect(config.flushIntervalMs).toBe(30000)
    expect(config.countSymbols).toBe(false)
    expect(config.countNumbers).toBe(true)
  })

  test('an explicit config path is resolved against cwd', () => {
    writeConfig(JSON.stringify({ databaseFile: 'other.db' }), path.join(tmpDir, 'etc'))

    const config = loadConfig({ configPath: 'etc/config.json', env: {}, cwd: tmpDir })
    expect(config.databasePath).toBe(path.join(tmpDir, 'data', 'other.db'))
  })

  test('environment variables override the file', () => {
    writeConfig(JSON.stringify({ flushIntervalMs: 30000 }), path.join(tmpDir, 'custom'))

    const config = loadConfig({
      env: { INPUT_COUNTER_DATA_DIR: 'custom', INPUT_COUNTER_FLUSH_INTERVAL_MS: '5000' },
      cwd: tmpDir,
    })
    expect(config.dataDir).toBe(path.join(tmpDir, 'custom'))
    expect(config.flushIntervalMs).toBe(5000)
  })

  test('warns about unknown keys and ignores them', () => {
    const file = writeConfig(JSON.stringify({ flushIntervalMs: 2000, colour: 'blue' }))

    const config = loadConfig({ env: {}, cwd: tmpDir })
    expect(config.flushIntervalMs).toBe(2000)
    expect(config).not.toHaveProperty('colour')
    expect(warnSpy).toHaveBeenCalledWith(`Ignoring unknown config key "colour" in ${file}`)
  })

  test('rejects a flush interval below one second', () => {
    writeConfig(JSON.stringify({ flushIntervalMs: 500 }))

    expect(() => loadConfig({ env: {}, cwd: tmpDir })).toThrow(ValidationError)
    expect(() => loadConfig({ env: {}, cwd: tmpDir })).toThrow(/^Invalid configuration: flushIntervalMs: /)
  })

  test('rejects a non-numeric flush interval from the environment', () => {
    expect(() => loadConfig({ env: { INPUT_COUNTER_FLUSH_INTERVAL_MS: 'soon' }, cwd: tmpDir })).toThrow(
      /^Invalid environment variables: INPUT_COUNTER_FLUSH_INTERVAL_MS: /,
    )
  })

  test('rejects malformed JSON', () => {
    const file = writeConfig('{ "flushIntervalMs": ')

    expect(() => loadConfig({ env: {}, cwd: tmpDir })).toThrow(`Could not read config file ${file}`)
  })

  test('rejects a config file that is not an object', () => {
    const file = writeConfig('[1, 2, 3]')

    expect(() => loadConfig({ env: {}, cwd: tmpDir })).toThrow(`Config file ${file} must contain a JSON object`)
  })

  test('the result is frozen', () => {
    const config = loadConfig({ env: {}, cwd: tmpDir })
    expect(Object.isFrozen(config)).toBe(true)
  })
})
