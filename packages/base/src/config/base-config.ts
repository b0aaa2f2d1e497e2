import { logLevelNames } from "@docbase/logger"
import { z } from "zod"
import { InvalidArgumentError } from "../errors"
import { toIssues } from "../core/validation/issues"

export const DEFAULT_HOST = "database.deta.sh"

/** Fixed service-level timeout handed to the transport. */
export const BASE_SERVICE_TIMEOUT_MS = 300_000

const nonEmpty = "must be a non-empty string"

export const baseConfigSchema = z.object({
  /** Collection name. */
  name: z.string(nonEmpty).min(1, nonEmpty),
  projectKey: z.string(nonEmpty).min(1, nonEmpty),
  /** Derived from the project key prefix (`<projectId>_<secret>`) when omitted. */
  projectId: z.string().min(1, nonEmpty).optional(),
  host: z.string().min(1, nonEmpty).default(DEFAULT_HOST),
  timeoutMs: z.number().int().positive().default(BASE_SERVICE_TIMEOUT_MS),
  logging: z
    .object({
      level: z.enum(logLevelNames).default("warn"),
      prettify: z.boolean().default(false),
    })
    .default({ level: "warn", prettify: false }),
})

export type BaseConfigInput = z.input<typeof baseConfigSchema>

type ParsedBaseConfig = z.output<typeof baseConfigSchema>

export type BaseConfig = Readonly<
  Omit<ParsedBaseConfig, "projectId" | "logging"> & {
    projectId: string
    logging: Readonly<ParsedBaseConfig["logging"]>
  }
>

function deriveProjectId(projectKey: string): string {
  const separator = projectKey.indexOf("_")

  if (separator <= 0) {
    throw InvalidArgumentError.fromIssues("base config", [
      {
        path: "projectKey",
        message: "expected '<projectId>_<secret>' when projectId is not given",
      },
    ])
  }

  return projectKey.slice(0, separator)
}

/**
 * Validates client options into an immutable config.
 *
 * @throws InvalidArgumentError listing every schema issue.
 */
export function parseBaseConfig(input: BaseConfigInput): BaseConfig {
  const result = baseConfigSchema.safeParse(input)

  if (!result.success) {
    throw InvalidArgumentError.fromIssues("base config", toIssues(result.error))
  }

  const { projectId, logging, ...rest } = result.data

  return Object.freeze({
    ...rest,
    projectId: projectId ?? deriveProjectId(rest.projectKey),
    logging: Object.freeze({ ...logging }),
  })
}
