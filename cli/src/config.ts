/**
 * Console configuration
 *
 * Validates the BRIDGE_* environment variables with Zod and resolves them
 * into the values the console reads.
 *
 * Usage:
 *   const config = loadConfig()
 *   config.repoRoot // absolute path
 */

import path from 'node:path'
import { z } from 'zod'

const envSchema = z.object({
  BRIDGE_REPO_ROOT: z.string().trim().min(1, 'BRIDGE_REPO_ROOT must not be empty').optional(),
  BRIDGE_REPOSITORY: z.string().trim().min(1, 'BRIDGE_REPOSITORY must not be empty').default('local checkout'),
  BRIDGE_WORKFLOW_NAME: z.string().trim().min(1, 'BRIDGE_WORKFLOW_NAME must not be empty').default('Charlotte Bridge'),
})

export type ConsoleConfig = {
  repoRoot: string
  repository: string
  workflowName: string
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid environment configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`)
    this.name = 'ConfigError'
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): ConsoleConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`))
  }
  const { BRIDGE_REPO_ROOT, BRIDGE_REPOSITORY, BRIDGE_WORKFLOW_NAME } = parsed.data
  return {
    repoRoot: path.resolve(cwd, BRIDGE_REPO_ROOT ?? '.'),
    repository: BRIDGE_REPOSITORY,
    workflowName: BRIDGE_WORKFLOW_NAME,
  }
}
