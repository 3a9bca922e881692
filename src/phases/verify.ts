import fs from 'fs-extra'

import { isDirectory, isSymlink, lexists } from '../core/fs.js'
import type { InstallPhase } from '../core/runner.js'
import { launcherPath } from './launcher.js'
import { privateDirs } from './user-dirs.js'

export const verifyPhase: InstallPhase = {
  name: 'verify',
  title: 'Final Verification',
  description: 'Verify the installed files and show a summary.',
  async run({ config, logger, run, warn }) {
    if (run.dryRun) {
      logger.info('[DRY-RUN] Would verify the installation')
      return
    }

    const launcher = launcherPath(config)
    if (await lexists(launcher)) logger.success(`Verified: ${launcher}`)
    else warn(`Missing: ${launcher}`)

    if (await isSymlink(config.binLink)) logger.success(`Symlink OK: ${await fs.readlink(config.binLink)}`)
    else warn(`Symlink not found at ${config.binLink}`)

    for (const file of [...config.electronFlagsFiles, config.kdeEnvScript, config.desktopFile]) {
      if (await lexists(file)) logger.success(`Verified: ${file}`)
      else warn(`Missing: ${file}`)
    }

    for (const dir of privateDirs(config)) {
      if (await isDirectory(dir)) {
        const mode = (await fs.stat(dir)).mode & 0o777
        logger.success(`Verified: ${dir} (permissions: ${mode.toString(8)})`)
      } else {
        warn(`Missing: ${dir}`)
      }
    }
  },
}
