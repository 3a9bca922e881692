export type InstallerErrorCode =
  | 'BackupFailed'
  | 'MutationFailed'
  | 'NoJournal'
  | 'BackupNotFound'
  | 'JournalCorrupt'
  | 'PreflightFailed'

export class InstallerError extends Error {
  readonly code: InstallerErrorCode
  readonly targetPath?: string
  readonly action?: string

  constructor(code: InstallerErrorCode, message: string, opts: { targetPath?: string; action?: string; cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause })
    this.name = 'InstallerError'
    this.code = code
    this.targetPath = opts.targetPath
    this.action = opts.action
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error && e.message) return e.message
  return String(e)
}

export function isInstallerError(e: unknown, code?: InstallerErrorCode): e is InstallerError {
  return e instanceof InstallerError && (code === undefined || e.code === code)
}

export function isNotFound(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT'
}
