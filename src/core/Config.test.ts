import fs from 'fs-extra'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { LogLevel } from '../utils/logger'
import { DEFAULT_THROTTLE_SECONDS, loadConfigFile, resolveConfig } from './Config'

describe('Config', () => {
  let dir: string
  let configPath: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tbox-config-'))
    configPath = path.join(dir, 'config.json')
  })

  afterEach(async () => {
    await fs.remove(dir)
  })

  it('uses defaults without a config file', async () => {
    expect(await resolveConfig({ TBOX_CONFIG: configPath, XDG_DATA_HOME: '/xdg' })).toEqual({
      storeDir: '/xdg/tmux-box',
      configPath,
      selector: null,
      runCommands: true,
      throttleSeconds: DEFAULT_THROTTLE_SECONDS,
      logLevel: LogLevel.WARN,
      logFile: null,
    })
  })

  it('reads settings from the config file', async () => {
    await fs.writeJson(configPath, {
      storeDir: '/data/boxes',
      selector: 'sk',
      runCommands: false,
      throttleSeconds: 10,
      logLevel: 'debug',
      logFile: '/var/log/tbox.log',
    })

    expect(await resolveConfig({ TBOX_CONFIG: configPath })).toEqual({
      storeDir: '/data/boxes',
      configPath,
      selector: 'sk',
      runCommands: false,
      throttleSeconds: 10,
      logLevel: LogLevel.DEBUG,
      logFile: '/var/log/tbox.log',
    })
  })

  it('lets the environment override the file', async () => {
    await fs.writeJson(configPath, { storeDir: '/data/boxes', selector: 'sk', runCommands: false, throttleSeconds: 10 })

    const config = await resolveConfig({
      TBOX_CONFIG: configPath,
      TBOX_DIR: '/env/boxes',
      TBOX_SELECTOR: 'fzf',
      TBOX_RUN_COMMANDS: 'yes',
      TBOX_THROTTLE_SECONDS: '0',
      TBOX_LOG_LEVEL: 'error',
    })

    expect(config).toMatchObject({
      storeDir: '/env/boxes',
      selector: 'fzf',
      runCommands: true,
      throttleSeconds: 0,
      logLevel: LogLevel.ERROR,
    })
  })

  it('ignores unparsable environment values', async () => {
    await fs.writeJson(configPath, { runCommands: false })

    const config = await resolveConfig({
      TBOX_CONFIG: configPath,
      TBOX_RUN_COMMANDS: 'maybe',
      TBOX_THROTTLE_SECONDS: '-4',
      TBOX_LOG_LEVEL: 'loud',
    })

    expect(config).toMatchObject({ runCommands: false, throttleSeconds: 3, logLevel: LogLevel.WARN })
  })

  it('ignores an invalid config file', async () => {
    await fs.writeJson(configPath, { throttleSeconds: -1 })
    expect(await loadConfigFile(configPath)).toEqual({})

    await fs.writeFile(configPath, '{ not json')
    expect(await loadConfigFile(configPath)).toEqual({})
  })
})
