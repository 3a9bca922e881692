import fs from 'fs-extra'
import path from 'path'

import { InstallerError } from './errors.js'
import type { MutationKind, MutationRecord, RunContext } from '../types.js'

const TOKEN_BY_KIND: Record<MutationKind, string> = {
  FileCreated: 'CREATED',
  DirCreated: 'CREATED_DIR',
  FileModified: 'MODIFIED',
  DirModified: 'MODIFIED_DIR',
}

const KIND_BY_TOKEN: ReadonlyMap<string, MutationKind> = new Map<string, MutationKind>([
  ['CREATED', 'FileCreated'],
  ['CREATED_DIR', 'DirCreated'],
  ['MODIFIED', 'FileModified'],
  ['MODIFIED_DIR', 'DirModified'],
])

export function isModified(r: MutationRecord): r is Extract<MutationRecord, { backupPath: string }> {
  return r.kind === 'FileModified' || r.kind === 'DirModified'
}

function checkField(value: string, what: string) {
  if (!value) {
    throw new InstallerError('JournalCorrupt', `Cannot journal an empty ${what}`, { action: 'append' })
  }
  if (/[|\n\r]/.test(value)) {
    throw new InstallerError('JournalCorrupt', `Cannot journal ${what} containing '|' or a newline: ${JSON.stringify(value)}`, {
      targetPath: value,
      action: 'append',
    })
  }
}

/**
 * `kind|targetPath[|backupPath]`, without the trailing newline.
 */
export function encodeRecord(r: MutationRecord): string {
  checkField(r.targetPath, 'target path')
  if (isModified(r)) {
    checkField(r.backupPath, 'backup path')
    return `${TOKEN_BY_KIND[r.kind]}|${r.targetPath}|${r.backupPath}`
  }
  return `${TOKEN_BY_KIND[r.kind]}|${r.targetPath}`
}

export function decodeRecord(line: string, lineNo = 0): MutationRecord {
  const corrupt = (why: string) =>
    new InstallerError('JournalCorrupt', `Journal line ${lineNo}: ${why}: ${JSON.stringify(line)}`, { action: 'read' })

  const [token, targetPath, backupPath, ...extra] = line.split('|')
  const kind = KIND_BY_TOKEN.get(token)
  if (!kind) throw corrupt(`unknown record kind '${token}'`)
  if (!targetPath) throw corrupt('missing target path')
  if (extra.length) throw corrupt('too many fields')

  switch (kind) {
    case 'FileCreated':
    case 'DirCreated':
      if (backupPath !== undefined) throw corrupt(`${kind} record must not carry a backup path`)
      return { kind, targetPath }
    case 'FileModified':
    case 'DirModified':
      if (!backupPath) throw corrupt(`${kind} record requires a backup path`)
      return { kind, targetPath, backupPath }
    default: {
      const _exhaustive: never = kind
      throw corrupt(`unhandled kind ${String(_exhaustive)}`)
    }
  }
}

export function parseJournal(text: string): MutationRecord[] {
  const records: MutationRecord[] = []
  const lines = text.split('\n')
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].replace(/\r$/, '')
    if (!line.trim()) continue
    records.push(decodeRecord(line, i + 1))
  }
  return records
}

/**
 * Append-only, strictly ordered log of mutation records for one installation
 * lineage. A single process is expected to use a journal file at a time;
 * there is no locking.
 */
export class Journal {
  private readonly dryRunRecords: MutationRecord[] = []

  constructor(private readonly ctx: RunContext, readonly filePath: string = ctx.journalPath) {}

  /**
   * Durable before returning: the line is fsync'd so the caller may mutate
   * right after. In dry-run the record is kept in memory only.
   */
  append(record: MutationRecord): void {
    const line = encodeRecord(record) + '\n'
    if (this.ctx.dryRun) {
      this.dryRunRecords.push(record)
      this.ctx.logger.verbose(`[DRY-RUN] Would journal: ${line.trimEnd()}`)
      return
    }

    fs.ensureDirSync(path.dirname(this.filePath))
    const fd = fs.openSync(this.filePath, 'a')
    try {
      fs.writeSync(fd, line)
      fs.fsyncSync(fd)
    } finally {
      fs.closeSync(fd)
    }
    this.ctx.logger.verbose(`Journaled: ${line.trimEnd()}`)
  }

  exists(): boolean {
    return fs.pathExistsSync(this.filePath)
  }

  /**
   * Every persisted record in append order. No filtering or compaction.
   */
  readAll(): MutationRecord[] {
    if (!this.exists()) {
      throw new InstallerError('NoJournal', `No journal found at ${this.filePath}; nothing to reverse`, {
        targetPath: this.filePath,
        action: 'read',
      })
    }
    return parseJournal(fs.readFileSync(this.filePath, 'utf8'))
  }

  /**
   * Records appended during this dry-run invocation.
   */
  pending(): readonly MutationRecord[] {
    return this.dryRunRecords
  }
}
