import path from 'path'

import type { InstallerConfig } from '../cli/config.js'
import type { InstallPhase } from '../core/runner.js'
import { renderTemplate } from './templates.js'

export const DATA_SUBDIRS = ['Projects', 'Conversations', 'Extensions', 'Extensions Settings', 'blob_storage']

/**
 * Directories created owner-only.
 */
export function privateDirs(config: InstallerConfig): string[] {
  return [config.userDataDir, config.logDir, config.cacheDir]
}

export const userDirsPhase: InstallPhase = {
  name: 'user-dirs',
  title: 'User Directory Setup',
  description: 'Create directories for application data, logs and cache, and default config files.',
  async run({ config, mutator, logger }) {
    logger.info('Creating application data directories...')
    for (const dir of privateDirs(config)) {
      await mutator.ensureDirectory(dir, { mode: 0o700 })
    }
    for (const sub of DATA_SUBDIRS) {
      await mutator.ensureDirectory(path.join(config.userDataDir, sub))
    }
    await mutator.ensureDirectory(config.preferencesDir)

    logger.info('Creating default configuration files...')
    await mutator.writeFileIfAbsent(path.join(config.userDataDir, 'config.json'), await renderTemplate('user-config.json'))
    await mutator.writeFileIfAbsent(path.join(config.userDataDir, 'desktop_config.json'), await renderTemplate('desktop-config.json'))
  },
}
