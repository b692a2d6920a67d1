import {
  credentialsFromFile,
  credentialsFromInfo,
} from "../common/credentials.js"
import { DuplicateCredentialArgsError } from "../common/errors/DuplicateCredentialArgsError.js"
import { InvalidArgumentError } from "../common/errors/InvalidArgumentError.js"
import { callUnary, type UnaryMethod } from "../common/grpc/client.js"
import { GRPCConnectionManager, type ServiceTransport } from "../common/grpc/connection.js"
import { createLogger, type Logger } from "../common/logger.js"
import {
  getDefaultMtlsEndpoint,
  resolveClientOptions,
  type ClientOptions,
} from "../common/options.js"
import type { CallMetadata } from "../common/pagination/types.js"

/**
 * Per-call options accepted by every client method
 */
export interface CallOptions {
  /** Extra metadata pairs sent with the call, and with every page fetch of a list call */
  metadata?: CallMetadata

  /** Deadline in milliseconds, counted from the start of each call */
  timeout?: number

  /** Cancels the pending call; for list calls, also the pager's page fetches */
  signal?: AbortSignal
}

export const ROUTING_HEADER_KEY = "x-goog-request-params"

/**
 * Build the routing header naming the resource a call targets, e.g.
 * `["x-goog-request-params", "parent=projects%2Fp%2Fregions%2Fr"]`.
 */
export function routingHeader(params: Record<string, string>): [string, string] {
  return [ROUTING_HEADER_KEY, new URLSearchParams(params).toString()]
}

const DEFAULT_ENDPOINT = "dataproc.googleapis.com"

/**
 * Connection setup and call plumbing shared by the service clients.
 */
export abstract class ServiceClient {
  static readonly DEFAULT_ENDPOINT = DEFAULT_ENDPOINT
  static readonly DEFAULT_MTLS_ENDPOINT = getDefaultMtlsEndpoint(DEFAULT_ENDPOINT)

  protected readonly transport: ServiceTransport
  protected readonly logger: Logger

  /**
   * @throws DuplicateCredentialArgsError if credentials are given more than one way
   * @throws InvalidConfigurationError if the options or environment are invalid
   * @throws MutualTLSChannelError if the mTLS endpoint setting is invalid
   */
  constructor(options: ClientOptions = {}) {
    this.logger = options.logger ?? createLogger()

    if (options.transport) {
      if (options.credentials || options.credentialsFile) {
        throw new DuplicateCredentialArgsError(
          "when providing a transport instance, provide its credentials directly",
        )
      }
      this.transport = options.transport
    } else {
      const resolved = resolveClientOptions(options, {
        defaultEndpoint: ServiceClient.DEFAULT_ENDPOINT,
        defaultMtlsEndpoint: ServiceClient.DEFAULT_MTLS_ENDPOINT,
      })
      this.transport = new GRPCConnectionManager(resolved, this.logger)
    }
  }

  /**
   * Create a client authenticated with parsed credentials info.
   */
  static fromCredentialsInfo<T extends ServiceClient>(
    this: new (options?: ClientOptions) => T,
    info: unknown,
    options: ClientOptions = {},
  ): T {
    return new this({ ...options, credentials: credentialsFromInfo(info) })
  }

  /**
   * Create a client authenticated with a JSON credentials file.
   */
  static fromCredentialsFile<T extends ServiceClient>(
    this: new (options?: ClientOptions) => T,
    path: string,
    options: ClientOptions = {},
  ): T {
    return new this({ ...options, credentials: credentialsFromFile(path) })
  }

  /**
   * host:port this client talks to
   */
  get host(): string {
    return this.transport.host
  }

  /**
   * Close the underlying connection.
   */
  close(): void {
    this.transport.close()
  }

  /**
   * Metadata pairs for one call: the caller's, then the routing header when
   * the method has one.
   */
  protected callMetadata(
    options: CallOptions,
    routing?: Record<string, string>,
  ): CallMetadata {
    const metadata = [...(options.metadata ?? [])]
    if (routing) {
      metadata.push(routingHeader(routing))
    }
    return metadata
  }

  /**
   * The request passed to `method`, or `undefined` when the caller gave
   * flattened fields instead and the method has to build the request.
   * A field set to `undefined` counts as not given.
   *
   * @throws InvalidArgumentError if both a request and flattened fields are given
   */
  protected requestOrFields<TRequest>(
    method: string,
    request: TRequest | null | undefined,
    fields: object,
  ): TRequest | undefined {
    const flattened = Object.values(fields).some((value) => value !== undefined)
    if (request && flattened) {
      throw new InvalidArgumentError(
        `${method}: pass either a request object or flattened fields, not both`,
      )
    }
    return request ?? undefined
  }

  protected unary<TRequest, TResponse>(
    rpc: string,
    method: UnaryMethod<TRequest, TResponse>,
    request: TRequest,
    metadata: CallMetadata,
    options: CallOptions,
  ): Promise<TResponse> {
    const grpcMetadata = this.transport.getMetadata().clone()
    for (const [key, value] of metadata) {
      grpcMetadata.add(key, value)
    }

    const deadline =
      options.timeout === undefined ? undefined : new Date(Date.now() + options.timeout)

    this.logger.debug({ rpc, host: this.transport.host }, "calling")

    return callUnary(method, request, grpcMetadata, {
      deadline,
      signal: options.signal,
    })
  }
}
