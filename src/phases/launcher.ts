import path from 'path'

import type { InstallerConfig } from '../cli/config.js'
import type { InstallPhase } from '../core/runner.js'
import { renderTemplate } from './templates.js'

export function launcherPath(config: InstallerConfig): string {
  return path.join(config.installDir, 'Contents', 'MacOS', config.appName)
}

export const launcherPhase: InstallPhase = {
  name: 'launcher',
  title: 'Launcher Creation',
  description: 'Write the launch script with Wayland + KDE Plasma support and link it onto the PATH.',
  async run({ config, mutator, logger }) {
    const launcher = launcherPath(config)
    const script = await renderTemplate('launcher.sh', { appName: config.appName, logDir: config.logDir })
    await mutator.writeFile(launcher, script, { mode: 0o755 })
    logger.success(`Launcher script created: ${launcher}`)

    await mutator.symlink(config.binLink, launcher)
    logger.success(`Symlink created: ${config.binLink} -> ${launcher}`)
  },
}
