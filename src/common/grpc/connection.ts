import type * as grpc from "@grpc/grpc-js"

import type { Logger } from "../logger.js"
import type { ResolvedClientOptions } from "../options.js"
import type { ClusterControllerStub, WorkflowTemplateServiceStub } from "./client.js"
import {
  createAuthMetadata,
  createChannelCredentials,
  createClusterControllerClient,
  createWorkflowTemplateServiceClient,
} from "./client.js"

/**
 * What the service clients need from a connection: one stub per service and
 * the metadata that authenticates every call.
 *
 * {@link GRPCConnectionManager} is the production implementation; pass your
 * own through `ClientOptions.transport` to route calls elsewhere.
 */
export interface ServiceTransport {
  /** host:port the transport talks to */
  readonly host: string
  getClusterController(): ClusterControllerStub
  getWorkflowTemplateService(): WorkflowTemplateServiceStub
  getMetadata(): grpc.Metadata
  close(): void
}

/**
 * Manages gRPC connection lifecycle
 *
 * This class handles lazy initialization of the service stubs. A stub is
 * created only when first accessed and reused afterwards; stubs share the
 * channel credentials and the authentication metadata.
 *
 * @example
 * ```typescript
 * const manager = new GRPCConnectionManager({
 *   host: "dataproc.googleapis.com:443",
 *   credentials: { type: "access_token", token },
 *   insecure: false,
 * })
 * const stub = manager.getClusterController()
 * const metadata = manager.getMetadata()
 * // ... use stub ...
 * manager.close()
 * ```
 */
export class GRPCConnectionManager implements ServiceTransport {
  private clusterController: ClusterControllerStub | null = null
  private workflowTemplateService: WorkflowTemplateServiceStub | null = null
  private channelCredentials: grpc.ChannelCredentials | null = null
  private metadata: grpc.Metadata | null = null
  private options: ResolvedClientOptions
  private logger?: Logger

  /**
   * @param options - Resolved host, credentials and TLS settings
   * @param logger - Receives connection lifecycle events at debug level
   */
  constructor(options: ResolvedClientOptions, logger?: Logger) {
    this.options = options
    this.logger = logger
  }

  get host(): string {
    return this.options.host
  }

  getClusterController(): ClusterControllerStub {
    if (!this.clusterController) {
      this.clusterController = createClusterControllerClient(
        this.options.host,
        this.getChannelCredentials(),
      )
      this.logger?.debug(
        { host: this.options.host, service: "ClusterController" },
        "created gRPC client",
      )
    }
    return this.clusterController
  }

  getWorkflowTemplateService(): WorkflowTemplateServiceStub {
    if (!this.workflowTemplateService) {
      this.workflowTemplateService = createWorkflowTemplateServiceClient(
        this.options.host,
        this.getChannelCredentials(),
      )
      this.logger?.debug(
        { host: this.options.host, service: "WorkflowTemplateService" },
        "created gRPC client",
      )
    }
    return this.workflowTemplateService
  }

  /**
   * Get authentication metadata
   *
   * The metadata is created once and reused; callers clone it before adding
   * per-call entries.
   */
  getMetadata(): grpc.Metadata {
    if (!this.metadata) {
      this.metadata = createAuthMetadata(
        this.options.credentials,
        this.options.quotaProjectId,
      )
    }
    return this.metadata
  }

  /**
   * Close the gRPC connection
   *
   * Closes every stub created so far. Stubs are recreated on next access.
   */
  close(): void {
    this.clusterController?.close()
    this.workflowTemplateService?.close()

    if (this.clusterController || this.workflowTemplateService) {
      this.logger?.debug({ host: this.options.host }, "closed gRPC clients")
    }

    this.clusterController = null
    this.workflowTemplateService = null
    this.channelCredentials = null
    this.metadata = null
  }

  private getChannelCredentials(): grpc.ChannelCredentials {
    if (!this.channelCredentials) {
      this.channelCredentials = createChannelCredentials(this.options)
    }
    return this.channelCredentials
  }
}
