import { z } from "zod"
import { DEFAULT_MAX_DEPTH } from "../source-chain"

export const reportEnvSchema = z.object({
  REPORT_PRETTY: z.stringbool().default(false),
  REPORT_MAX_DEPTH: z.coerce.number().int().positive().default(DEFAULT_MAX_DEPTH),
  REPORT_INCLUDE_NAME: z.stringbool().default(false),
})

export type ReportEnv = z.infer<typeof reportEnvSchema>

export type ReportConfig = {
  /** Render reports across multiple lines. */
  pretty: boolean

  /** Maximum number of causes rendered below the root error. */
  maxDepth: number

  /** Prefix `Error` messages with their name. */
  includeName: boolean
}

export function mapEnvToConfig(env: ReportEnv): ReportConfig {
  return {
    pretty: env.REPORT_PRETTY,
    maxDepth: env.REPORT_MAX_DEPTH,
    includeName: env.REPORT_INCLUDE_NAME,
  }
}
