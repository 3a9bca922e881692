import fs from 'fs-extra'
import os from 'os'
import path from 'path'

import { DEFAULT_PRIVILEGED_ROOTS, DEFAULT_STATE_DIRNAME } from '../core/context.js'

export const CONFIG_FILENAME = 'installer.config.json'

export interface InstallerConfig {
  appName: string
  /**
   * Prepared application bundle (already extracted) copied into installDir.
   */
  bundleDir: string
  installDir: string
  /**
   * Command-line symlink to the launcher.
   */
  binLink: string
  userDataDir: string
  logDir: string
  cacheDir: string
  preferencesDir: string
  electronFlagsFiles: string[]
  kdeEnvScript: string
  desktopFile: string
  stateDir: string
  privilegedRoots: string[]
}

export interface ConfigEnv {
  /**
   * For tests or embedding, override home dir (default: os.homedir()).
   */
  homeDir?: string
  /**
   * Default: process.cwd().
   */
  cwd?: string
}

const STRING_KEYS = [
  'appName',
  'bundleDir',
  'installDir',
  'binLink',
  'userDataDir',
  'logDir',
  'cacheDir',
  'preferencesDir',
  'kdeEnvScript',
  'desktopFile',
  'stateDir',
] as const

const LIST_KEYS = ['electronFlagsFiles', 'privilegedRoots'] as const

export function slugOf(appName: string) {
  return appName.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '') || 'app'
}

export function defaultInstallerConfig(appName = 'App', opts: ConfigEnv = {}): InstallerConfig {
  const home = opts.homeDir ?? os.homedir()
  const cwd = opts.cwd ?? process.cwd()
  const slug = slugOf(appName)
  return {
    appName,
    bundleDir: path.join(cwd, 'bundle'),
    installDir: `/Applications/${appName}.app`,
    binLink: `/usr/local/bin/${slug}`,
    userDataDir: path.join(home, 'Library', 'Application Support', appName),
    logDir: path.join(home, 'Library', 'Logs', appName),
    cacheDir: path.join(home, 'Library', 'Caches', appName),
    preferencesDir: path.join(home, 'Library', 'Preferences'),
    electronFlagsFiles: [
      path.join(home, '.config', 'electron-flags.conf'),
      path.join(home, '.config', 'electron25-flags.conf'),
    ],
    kdeEnvScript: path.join(home, '.config', 'plasma-workspace', 'env', 'electron-wayland.sh'),
    desktopFile: path.join(home, '.local', 'share', 'applications', `${slug}.desktop`),
    stateDir: path.join(cwd, DEFAULT_STATE_DIRNAME),
    privilegedRoots: [...DEFAULT_PRIVILEGED_ROOTS],
  }
}

function resolveMaybeRelative(baseDir: string, p: string): string {
  return path.isAbsolute(p) ? path.normalize(p) : path.resolve(baseDir, p)
}

function field(raw: object, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(raw, key) ? Reflect.get(raw, key) : undefined
}

/**
 * Overlays a parsed config file on the defaults. Relative paths resolve
 * against `baseDir`; unknown keys are ignored; wrongly typed keys throw.
 */
export function normalizeInstallerConfig(raw: unknown, baseDir: string, opts: ConfigEnv = {}): InstallerConfig {
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new Error('Invalid installer config: expected a JSON object')
  }

  let appName = 'App'
  const rawName = field(raw, 'appName')
  if (rawName !== undefined) {
    if (typeof rawName !== 'string' || !rawName.trim()) {
      throw new Error('Invalid installer config: "appName" must be a non-empty string')
    }
    appName = rawName
  }
  const config = defaultInstallerConfig(appName, opts)

  for (const key of STRING_KEYS) {
    const v = field(raw, key)
    if (v === undefined || key === 'appName') continue
    if (typeof v !== 'string' || !v) throw new Error(`Invalid installer config: "${key}" must be a non-empty string`)
    config[key] = resolveMaybeRelative(baseDir, v)
  }
  for (const key of LIST_KEYS) {
    const v = field(raw, key)
    if (v === undefined) continue
    if (!Array.isArray(v) || !v.every((x): x is string => typeof x === 'string' && x.length > 0)) {
      throw new Error(`Invalid installer config: "${key}" must be an array of non-empty strings`)
    }
    config[key] = v.map(p => resolveMaybeRelative(baseDir, p))
  }
  return config
}

/**
 * `configPath` must exist when given. Otherwise `installer.config.json` in the
 * working directory is used if present, else the defaults.
 */
export async function loadInstallerConfig(configPath?: string, opts: ConfigEnv = {}): Promise<InstallerConfig> {
  const cwd = opts.cwd ?? process.cwd()
  if (configPath) {
    const abs = path.resolve(cwd, configPath)
    if (!await fs.pathExists(abs)) throw new Error(`Config file not found: ${abs}`)
    return normalizeInstallerConfig(await fs.readJson(abs), path.dirname(abs), opts)
  }
  const implicit = path.join(cwd, CONFIG_FILENAME)
  if (await fs.pathExists(implicit)) {
    return normalizeInstallerConfig(await fs.readJson(implicit), cwd, opts)
  }
  return defaultInstallerConfig('App', opts)
}
