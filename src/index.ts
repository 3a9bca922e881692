export type {
  CreatedKind,
  ModifiedKind,
  MutationKind,
  MutationRecord,
  Operation,
  Result,
  Step,
  Logger,
  RunContext,
  Decision,
} from './types.js'

export type { InstallerErrorCode } from './core/errors.js'
export type { Executor } from './core/fs-ops.js'
export type { BackupResult } from './core/backup.js'
export type { MutationWriter, GuardedMutatorDeps, ModeOptions } from './core/mutator.js'
export type { ApprovalGate, PromptIO } from './core/gate.js'
export type { ReversalState, ReversalDeps, ReversalReport, ReversalOutcome, LauncherLink } from './core/reverse.js'
export type { PhaseContext, InstallPhase, RunInstallInput, InstallStatus, InstallOutcome } from './core/runner.js'
export type { RunContextOptions } from './core/context.js'
export type { InstallerConfig, ConfigEnv } from './cli/config.js'

export { InstallerError, isInstallerError } from './core/errors.js'
export { createRunContext, formatRunId, DEFAULT_PRIVILEGED_ROOTS } from './core/context.js'
export { createConsoleLogger, silentLogger, fanOut } from './core/logger.js'
export { createFileLogger } from './core/audit.js'
export { Journal, encodeRecord, decodeRecord, parseJournal } from './core/journal.js'
export { BackupStore } from './core/backup.js'
export { GuardedMutator } from './core/mutator.js'
export { PrivilegeStrategy, elevatedExecutor } from './core/privilege.js'
export { localExecutor } from './core/fs-ops.js'
export { InteractiveGate, inquirerPrompts, REVERSE_CONFIRMATION_PHRASE } from './core/gate.js'
export { formatPlan } from './core/format-plan.js'
export { ReversalEngine } from './core/reverse.js'
export { runInstall } from './core/runner.js'
export { defaultInstallerConfig, loadInstallerConfig, normalizeInstallerConfig } from './cli/config.js'
export { defaultPhases, launcherPath } from './phases/index.js'
