import type { InstallPhase } from '../core/runner.js'
import { renderTemplate } from './templates.js'

export const waylandPhase: InstallPhase = {
  name: 'wayland',
  title: 'Wayland Configuration',
  description: 'Create Electron flags files and a KDE Plasma env script for Wayland.',
  async run({ config, mutator, logger }) {
    const flags = await renderTemplate('electron-flags.conf', { appName: config.appName })
    for (const file of config.electronFlagsFiles) {
      await mutator.writeFile(file, flags)
      logger.success(`Configured: ${file}`)
    }

    const envScript = await renderTemplate('kde-env.sh', { appName: config.appName })
    await mutator.writeFile(config.kdeEnvScript, envScript, { mode: 0o755 })
    logger.success(`Configured: ${config.kdeEnvScript}`)
  },
}
