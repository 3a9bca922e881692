import fs from 'fs-extra'
import path from 'path'

/**
 * The filesystem operations a mutation or a reversal step may perform.
 * Two implementations exist: the local one below, and the elevated one in
 * privilege.ts that shells out to sudo.
 */
export interface Executor {
  readonly elevated: boolean
  mkdirp(dir: string, mode?: number): Promise<void>
  writeFile(file: string, content: string, mode?: number): Promise<void>
  /**
   * Copy preserving permission bits, timestamps and symlinks verbatim.
   */
  copy(from: string, to: string): Promise<void>
  symlink(target: string, linkPath: string): Promise<void>
  /**
   * Recursive, and a no-op when the path is absent.
   */
  remove(p: string): Promise<void>
}

export async function ensureParentDir(p: string) {
  await fs.ensureDir(path.dirname(p))
}

export async function copyPreserving(from: string, to: string) {
  await ensureParentDir(to)
  await fs.copy(from, to, { dereference: false, preserveTimestamps: true, overwrite: true, errorOnExist: false })
}

export const localExecutor: Executor = {
  elevated: false,
  async mkdirp(dir, mode) {
    await fs.ensureDir(dir, mode === undefined ? undefined : { mode })
    if (mode !== undefined) await fs.chmod(dir, mode)
  },
  async writeFile(file, content, mode) {
    await ensureParentDir(file)
    await fs.writeFile(file, content, 'utf8')
    if (mode !== undefined) await fs.chmod(file, mode)
  },
  async copy(from, to) {
    await copyPreserving(from, to)
  },
  async symlink(target, linkPath) {
    await ensureParentDir(linkPath)
    await fs.remove(linkPath)
    await fs.symlink(target, linkPath)
  },
  async remove(p) {
    await fs.remove(p)
  },
}
