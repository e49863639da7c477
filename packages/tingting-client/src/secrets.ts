/**
 * Secret resolution for the static API token.
 *
 * Sources, highest priority first:
 * 1. Command execution (e.g. `op read op://vault/tingting/token`)
 * 2. File reference (e.g. ~/.secrets/tingting_token)
 * 3. Direct value
 *
 * The command comes from trusted configuration, so it runs through a shell.
 *
 * @module secrets
 */

import { execSync } from 'node:child_process'
import { existsSync, readFileSync, statSync } from 'node:fs'
import { homedir } from 'node:os'
import { join } from 'node:path'
import type { Logger } from './logger.js'

/** Default timeout for command execution in milliseconds */
export const DEFAULT_COMMAND_TIMEOUT = 5000

export interface SecretSource {
  direct?: string
  file?: string
  command?: string
  /** Timeout for command execution in milliseconds */
  commandTimeout?: number
}

export function expandTilde(filePath: string): string {
  if (filePath === '~') {
    return homedir()
  }
  if (filePath.startsWith('~/')) {
    return join(homedir(), filePath.slice(2))
  }
  return filePath
}

function warnIfWorldReadable(filePath: string, logger?: Logger): void {
  const mode = statSync(filePath).mode & 0o777
  if (mode & 0o004) {
    logger?.warn('Secret file is world-readable; restrict it with chmod 600', {
      file: filePath,
      mode: mode.toString(8),
    })
  }
}

function readFromCommand(command: string, timeout: number): string {
  try {
    return execSync(command, {
      encoding: 'utf-8',
      timeout,
      stdio: ['ignore', 'pipe', 'pipe'],
    }).trim()
  } catch (error) {
    if (error instanceof Error && 'killed' in error && error.killed === true) {
      throw new Error(`Secret command timed out after ${timeout}ms`)
    }
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Secret command failed: ${message}`)
  }
}

function readFromFile(filePath: string, logger?: Logger): string {
  const expanded = expandTilde(filePath)
  if (!existsSync(expanded)) {
    throw new Error(`Secret file does not exist: ${expanded}`)
  }

  warnIfWorldReadable(expanded, logger)

  try {
    return readFileSync(expanded, 'utf-8').trim()
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Failed to read secret file: ${message}`)
  }
}

/**
 * Resolves a secret from the first configured source.
 * Empty results resolve to undefined.
 */
export function resolveSecret(source: SecretSource, logger?: Logger): string | undefined {
  let resolved: string | undefined

  if (source.command?.trim()) {
    resolved = readFromCommand(source.command, source.commandTimeout ?? DEFAULT_COMMAND_TIMEOUT)
  } else if (source.file?.trim()) {
    resolved = readFromFile(source.file, logger)
  } else if (source.direct !== undefined) {
    resolved = source.direct.trim()
  }

  return resolved ? resolved : undefined
}
