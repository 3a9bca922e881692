import fs from 'fs-extra'

import { isNotFound } from './errors.js'

/**
 * lstat that maps ENOENT to undefined. Dangling symlinks still count as present.
 */
export async function lstatOrUndefined(p: string): Promise<fs.Stats | undefined> {
  try {
    return await fs.lstat(p)
  } catch (e) {
    if (isNotFound(e)) return undefined
    throw e
  }
}

export async function lexists(p: string): Promise<boolean> {
  return (await lstatOrUndefined(p)) !== undefined
}

export async function isDirectory(p: string): Promise<boolean> {
  const st = await lstatOrUndefined(p)
  return st?.isDirectory() ?? false
}

export async function isSymlink(p: string): Promise<boolean> {
  const st = await lstatOrUndefined(p)
  return st?.isSymbolicLink() ?? false
}
