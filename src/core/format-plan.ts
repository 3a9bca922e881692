import type { MutationRecord } from '../types.js'

export function formatRecord(r: MutationRecord): string {
  switch (r.kind) {
    case 'FileCreated':
      return `[DELETE]  ${r.targetPath}  (was newly created)`
    case 'DirCreated':
      return `[RMDIR]   ${r.targetPath}  (was newly created)`
    case 'FileModified':
    case 'DirModified':
      return `[RESTORE] ${r.targetPath}  (from ${r.backupPath})`
  }
}

/**
 * One line per record, in journal order.
 */
export function formatPlan(records: readonly MutationRecord[]): string {
  if (!records.length) return 'No changes.'
  return records.map(formatRecord).join('\n')
}
