import { execa } from 'execa'
import path from 'path'

import type { InstallPhase } from '../core/runner.js'
import { renderTemplate } from './templates.js'

export const desktopEntryPhase: InstallPhase = {
  name: 'desktop-entry',
  title: 'Desktop Entry',
  description: 'Create a .desktop file so the application appears in the application menu.',
  async run({ config, mutator, logger, run, warn }) {
    const entry = await renderTemplate('app.desktop', {
      appName: config.appName,
      exec: config.binLink,
      icon: path.join(config.installDir, 'Contents', 'Resources', 'icon.png'),
    })
    await mutator.writeFile(config.desktopFile, entry, { mode: 0o755 })
    logger.success(`Created: ${config.desktopFile}`)

    if (run.dryRun) return
    const dir = path.dirname(config.desktopFile)
    logger.verbose('Updating desktop database...')
    const res = await execa('update-desktop-database', [dir], { reject: false })
    if (res.failed) {
      warn(`update-desktop-database did not run for ${dir} (exit code ${res.exitCode ?? 'none'})`)
    } else {
      logger.success('Desktop database updated')
    }
  },
}
