export type CreatedKind = 'FileCreated' | 'DirCreated'
export type ModifiedKind = 'FileModified' | 'DirModified'
export type MutationKind = CreatedKind | ModifiedKind

/**
 * One journaled filesystem change. `*Created` means nothing existed at
 * `targetPath` beforehand; `*Modified` carries the snapshot taken just before.
 */
export type MutationRecord =
  | { readonly kind: CreatedKind; readonly targetPath: string }
  | { readonly kind: ModifiedKind; readonly targetPath: string; readonly backupPath: string }

export type Operation = 'install' | 'reverse'

export interface Step {
  /**
   * Phase name for forward runs, record kind for reversal.
   */
  kind: string
  message: string
  paths?: Record<string, string>
  status?: 'planned' | 'executed' | 'skipped' | 'failed'
  error?: string
}

export interface Result {
  ok: boolean
  operation: Operation
  dryRun: boolean
  startedAt: string
  finishedAt: string
  durationMs: number
  steps: Step[]
  warnings: string[]
  errors: string[]
}

export interface Logger {
  info(msg: string): void
  /**
   * High-verbosity detail: every mutation, its source, destination and outcome.
   */
  verbose(msg: string): void
  success(msg: string): void
  warn(msg: string): void
  error(msg: string): void
}

/**
 * Fixed for the lifetime of one invocation and handed to every component.
 * Nothing reads mode flags from process-wide state.
 */
export interface RunContext {
  readonly dryRun: boolean
  readonly reverseMode: boolean
  /**
   * Root of the journal, backups and log files.
   */
  readonly stateDir: string
  readonly journalPath: string
  /**
   * Timestamp-named subdirectory of stateDir holding this run's backups.
   */
  readonly runId: string
  /**
   * Paths under these roots are mutated through the elevated executor.
   */
  readonly privilegedRoots: readonly string[]
  readonly logger: Logger
}

export type Decision = 'approved' | 'declined'
