import fs from 'fs-extra'
import path from 'path'
import { fileURLToPath } from 'url'

// Same depth from src/phases and dist/phases.
export const TEMPLATES_DIR = fileURLToPath(new URL('../../templates/', import.meta.url))

/**
 * Fills `{{name}}` placeholders. A placeholder without a value throws.
 */
export function fillTemplate(text: string, vars: Record<string, string>): string {
  return text.replace(/\{\{(\w+)\}\}/g, (_m, key: string) => {
    const v = vars[key]
    if (v === undefined) throw new Error(`Template variable not provided: ${key}`)
    return v
  })
}

export async function renderTemplate(name: string, vars: Record<string, string> = {}): Promise<string> {
  const text = await fs.readFile(path.join(TEMPLATES_DIR, name), 'utf8')
  return fillTemplate(text, vars)
}
