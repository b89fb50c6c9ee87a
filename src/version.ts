/**
 * Version information for taskchat, read from package.json at startup.
 */

import {execSync} from 'child_process'
import {readFileSync} from 'fs'
import {fileURLToPath} from 'url'
import {z} from 'zod'

const PackageJson = z.object({version: z.string()})

function getPackageVersion(): string {
  try {
    const pkgPath = fileURLToPath(new URL('../package.json', import.meta.url))
    const parsed = PackageJson.safeParse(JSON.parse(readFileSync(pkgPath, 'utf-8')))
    return parsed.success ? parsed.data.version : '0.0.0'
  } catch {
    return '0.0.0'
  }
}

// Short commit hash when running from a git checkout
function getGitHash(): string {
  try {
    return execSync('git rev-parse --short HEAD', {
      encoding: 'utf-8',
      stdio: ['pipe', 'pipe', 'pipe'],
    }).trim()
  } catch {
    return 'unknown'
  }
}

export const VERSION = getPackageVersion()
export const GIT_HASH = getGitHash()
export const VERSION_STRING = `taskchat v${VERSION} (${GIT_HASH})`
