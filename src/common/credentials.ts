import { readFileSync } from "fs"
import { z } from "zod"

import { DuplicateCredentialArgsError } from "./errors/DuplicateCredentialArgsError.js"
import { InvalidConfigurationError } from "./errors/InvalidConfigurationError.js"

/**
 * Credentials attached to every call.
 *
 * - `anonymous`: no auth metadata
 * - `access_token`: sent as `authorization: Bearer <token>`
 * - `api_key`: sent as `x-goog-api-key`
 */
export type Credentials =
  | { type: "anonymous" }
  | { type: "access_token"; token: string }
  | { type: "api_key"; key: string }

export const AnonymousCredentials: Credentials = { type: "anonymous" }

/**
 * Shape of a credentials file or of the info passed to `fromCredentialsInfo`.
 */
const CredentialsInfoSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("access_token"), token: z.string().min(1) }),
  z.object({ type: z.literal("api_key"), key: z.string().min(1) }),
])

export type CredentialsInfo = z.infer<typeof CredentialsInfoSchema>

export interface CredentialSources {
  credentials?: Credentials
  credentialsFile?: string
}

/**
 * Build credentials from parsed credentials info, e.g. the contents of a
 * credentials file.
 *
 * @throws InvalidConfigurationError if `info` is not valid credentials info
 */
export function credentialsFromInfo(info: unknown): Credentials {
  const parsed = CredentialsInfoSchema.safeParse(info)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ")
    throw new InvalidConfigurationError(`invalid credentials info: ${issues}`, {
      cause: parsed.error,
    })
  }

  return parsed.data
}

/**
 * Load credentials from a JSON credentials file.
 *
 * @throws InvalidConfigurationError if the file cannot be read or parsed
 */
export function credentialsFromFile(path: string): Credentials {
  let contents: string
  try {
    contents = readFileSync(path, "utf8")
  } catch (e) {
    throw new InvalidConfigurationError(`cannot read credentials file ${path}`, {
      cause: e,
    })
  }

  let info: unknown
  try {
    info = JSON.parse(contents)
  } catch (e) {
    throw new InvalidConfigurationError(
      `credentials file ${path} is not valid JSON`,
      { cause: e },
    )
  }

  return credentialsFromInfo(info)
}

/**
 * Pick the credentials to use.
 *
 * Explicit `credentials` win, then `credentialsFile`, then the
 * `DATAPROC_ACCESS_TOKEN` environment variable, then the file named by
 * `DATAPROC_CREDENTIALS`. Without any of them calls are anonymous.
 *
 * @throws DuplicateCredentialArgsError if both `credentials` and `credentialsFile` are set
 */
export function resolveCredentials(
  sources: CredentialSources,
  env: Record<string, string | undefined> = process.env,
): Credentials {
  if (sources.credentials && sources.credentialsFile) {
    throw new DuplicateCredentialArgsError(
      "credentials and credentialsFile are mutually exclusive",
    )
  }

  if (sources.credentials) {
    return sources.credentials
  }
  if (sources.credentialsFile) {
    return credentialsFromFile(sources.credentialsFile)
  }

  const token = env["DATAPROC_ACCESS_TOKEN"]
  if (token) {
    return { type: "access_token", token }
  }

  const file = env["DATAPROC_CREDENTIALS"]
  if (file) {
    return credentialsFromFile(file)
  }

  return AnonymousCredentials
}
