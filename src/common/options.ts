import { readFileSync } from "fs"
import { z } from "zod"

import { resolveCredentials, type Credentials } from "./credentials.js"
import { InvalidConfigurationError } from "./errors/InvalidConfigurationError.js"
import { MutualTLSChannelError } from "./errors/MutualTLSChannelError.js"
import type { ServiceTransport } from "./grpc/connection.js"
import type { Logger } from "./logger.js"

/**
 * Returns the PEM-encoded client certificate chain and private key used for
 * mutual TLS.
 */
export type ClientCertSource = () => { certChain: Buffer; privateKey: Buffer }

export interface ClientOptions {
  /**
   * Host, optionally with port, to connect to. Overrides the mTLS endpoint
   * selection. Port 443 is assumed when none is given.
   */
  apiEndpoint?: string

  credentials?: Credentials

  /**
   * Path to a JSON credentials file. Mutually exclusive with `credentials`.
   */
  credentialsFile?: string

  /**
   * Client certificate for mutual TLS. Only used when
   * `GOOGLE_API_USE_CLIENT_CERTIFICATE` is `true`.
   */
  clientCertSource?: ClientCertSource

  /**
   * Project billed for quota, sent as `x-goog-user-project`.
   */
  quotaProjectId?: string

  /**
   * Use a plaintext channel, e.g. against a local emulator.
   */
  insecure?: boolean

  logger?: Logger

  /**
   * A ready-made transport. Credentials then belong to the transport and must
   * not be given here.
   */
  transport?: ServiceTransport
}

/**
 * Options after endpoint, certificate and credential resolution.
 */
export interface ResolvedClientOptions {
  /** host:port */
  host: string
  credentials: Credentials
  clientCertSource?: ClientCertSource
  quotaProjectId?: string
  insecure: boolean
}

export interface ServiceEndpoints {
  defaultEndpoint: string
  defaultMtlsEndpoint: string
}

const UseClientCertificateSchema = z.enum(["true", "false"]).default("false")
const UseMtlsEndpointSchema = z.enum(["never", "auto", "always"]).default("auto")

const DEFAULT_PORT = 443

/**
 * Derive the mTLS variant of a googleapis.com endpoint.
 *
 * `x.googleapis.com` becomes `x.mtls.googleapis.com` and
 * `x.sandbox.googleapis.com` becomes `x.mtls.sandbox.googleapis.com`. Any
 * other endpoint is returned as is.
 */
export function getDefaultMtlsEndpoint(endpoint: string): string
export function getDefaultMtlsEndpoint(endpoint: undefined): undefined
export function getDefaultMtlsEndpoint(
  endpoint: string | undefined,
): string | undefined
export function getDefaultMtlsEndpoint(
  endpoint: string | undefined,
): string | undefined {
  if (!endpoint) {
    return endpoint
  }

  const match = /^([^.]+)(\.mtls)?(\.sandbox)?(\.googleapis\.com)?/.exec(endpoint)
  const [, , mtls, sandbox, googleDomain] = match ?? []
  if (mtls || !googleDomain) {
    return endpoint
  }

  if (sandbox) {
    return endpoint.replace("sandbox.googleapis.com", "mtls.sandbox.googleapis.com")
  }

  return endpoint.replace(".googleapis.com", ".mtls.googleapis.com")
}

/**
 * The default client certificate source: PEM files named by
 * `DATAPROC_CLIENT_CERT` and `DATAPROC_CLIENT_KEY`, read when the channel is
 * created.
 */
export function defaultClientCertSource(
  env: Record<string, string | undefined> = process.env,
): ClientCertSource | undefined {
  const certPath = env["DATAPROC_CLIENT_CERT"]
  const keyPath = env["DATAPROC_CLIENT_KEY"]
  if (!certPath || !keyPath) {
    return undefined
  }

  return () => ({
    certChain: readFileSync(certPath),
    privateKey: readFileSync(keyPath),
  })
}

/**
 * Append the default port unless `host` names one.
 */
export function withDefaultPort(host: string): string {
  return host.includes(":") ? host : `${host}:${DEFAULT_PORT}`
}

/**
 * Resolve the host to connect to, the client certificate and the credentials.
 *
 * `GOOGLE_API_USE_CLIENT_CERTIFICATE` (`true` | `false`, default `false`)
 * decides whether a client certificate is used at all.
 * `GOOGLE_API_USE_MTLS_ENDPOINT` (`never` | `auto` | `always`, default `auto`)
 * decides between the regular and the mTLS endpoint when no `apiEndpoint` is
 * given; `auto` picks mTLS only when a client certificate is available.
 *
 * @throws InvalidConfigurationError if `GOOGLE_API_USE_CLIENT_CERTIFICATE` holds another value
 * @throws MutualTLSChannelError if `GOOGLE_API_USE_MTLS_ENDPOINT` holds another value
 */
export function resolveClientOptions(
  options: ClientOptions,
  endpoints: ServiceEndpoints,
  env: Record<string, string | undefined> = process.env,
): ResolvedClientOptions {
  const useClientCert = UseClientCertificateSchema.safeParse(
    env["GOOGLE_API_USE_CLIENT_CERTIFICATE"],
  )
  if (!useClientCert.success) {
    throw new InvalidConfigurationError(
      "environment variable GOOGLE_API_USE_CLIENT_CERTIFICATE must be `true` or `false`",
      { cause: useClientCert.error },
    )
  }

  const useMtlsEndpoint = UseMtlsEndpointSchema.safeParse(
    env["GOOGLE_API_USE_MTLS_ENDPOINT"],
  )
  if (!useMtlsEndpoint.success) {
    throw new MutualTLSChannelError(
      "unsupported GOOGLE_API_USE_MTLS_ENDPOINT value, accepted values: never, auto, always",
      { cause: useMtlsEndpoint.error },
    )
  }

  const clientCertSource =
    useClientCert.data === "true"
      ? (options.clientCertSource ?? defaultClientCertSource(env))
      : undefined

  let host: string
  if (options.apiEndpoint) {
    host = options.apiEndpoint
  } else if (useMtlsEndpoint.data === "always") {
    host = endpoints.defaultMtlsEndpoint
  } else if (useMtlsEndpoint.data === "auto" && clientCertSource) {
    host = endpoints.defaultMtlsEndpoint
  } else {
    host = endpoints.defaultEndpoint
  }

  return {
    host: withDefaultPort(host),
    credentials: resolveCredentials(options, env),
    clientCertSource,
    quotaProjectId: options.quotaProjectId,
    insecure: options.insecure ?? false,
  }
}
