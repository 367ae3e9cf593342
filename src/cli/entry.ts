import { realpathSync } from 'node:fs'
import { fileURLToPath } from 'node:url'

/**
 * Whether the script Node was started with is this module. Both sides are
 * resolved through realpath so npm's bin symlink still counts.
 */
export function isEntryPoint(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (!scriptPath) return false

  try {
    return realpathSync(scriptPath) === realpathSync(fileURLToPath(moduleUrl))
  } catch (error) {
    // argv[1] may name something that no longer exists (e.g. `node -e`)
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return false
    throw error
  }
}
