import { InstallerError } from '../core/errors.js'
import { isDirectory } from '../core/fs.js'
import type { InstallPhase } from '../core/runner.js'

const SESSION_VARS = [
  'WAYLAND_DISPLAY',
  'XDG_SESSION_TYPE',
  'XDG_CURRENT_DESKTOP',
  'XDG_SESSION_DESKTOP',
  'DESKTOP_SESSION',
  'KDE_FULL_SESSION',
  'KDE_SESSION_VERSION',
  'ELECTRON_OZONE_PLATFORM_HINT',
]

export const preflightPhase: InstallPhase = {
  name: 'preflight',
  title: 'Pre-flight Validation',
  description: 'Check the application bundle and the invoking user. Changes nothing.',
  gated: false,
  async run({ config, logger, env, uid }) {
    logger.info(`Checking for the application bundle at ${config.bundleDir}...`)
    if (!await isDirectory(config.bundleDir)) {
      throw new InstallerError('PreflightFailed', `Application bundle not found at: ${config.bundleDir}`, {
        targetPath: config.bundleDir,
        action: 'preflight',
      })
    }
    logger.success(`Found application bundle: ${config.bundleDir}`)

    if (uid === 0) {
      throw new InstallerError('PreflightFailed', 'Do not run as root. sudo is used where needed.', { action: 'preflight' })
    }
    logger.success('Running as regular user (sudo will be used where needed)')

    logger.info('Environment summary:')
    for (const name of SESSION_VARS) {
      logger.verbose(`  ${name.padEnd(30)}${env[name] ?? '<not set>'}`)
    }
  },
}
