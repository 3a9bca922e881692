import type { InstallPhase } from '../core/runner.js'
import { desktopEntryPhase } from './desktop-entry.js'
import { installAppPhase } from './install-app.js'
import { launcherPhase } from './launcher.js'
import { preflightPhase } from './preflight.js'
import { userDirsPhase } from './user-dirs.js'
import { verifyPhase } from './verify.js'
import { waylandPhase } from './wayland.js'

export { launcherPath } from './launcher.js'

export function defaultPhases(): InstallPhase[] {
  return [
    preflightPhase,
    installAppPhase,
    launcherPhase,
    waylandPhase,
    userDirsPhase,
    desktopEntryPhase,
    verifyPhase,
  ]
}
