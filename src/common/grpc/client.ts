import * as grpc from "@grpc/grpc-js"
import * as protoLoader from "@grpc/proto-loader"
import * as path from "path"
import { fileURLToPath } from "url"

import type {
  Cluster,
  CreateClusterRequest,
  CreateWorkflowTemplateRequest,
  DeleteClusterRequest,
  DeleteWorkflowTemplateRequest,
  DiagnoseClusterRequest,
  Empty,
  GetClusterRequest,
  GetWorkflowTemplateRequest,
  InstantiateInlineWorkflowTemplateRequest,
  InstantiateWorkflowTemplateRequest,
  ListClustersRequest,
  ListClustersResponse,
  ListWorkflowTemplatesRequest,
  ListWorkflowTemplatesResponse,
  Operation,
  UpdateClusterRequest,
  UpdateWorkflowTemplateRequest,
  WorkflowTemplate,
} from "../../grpc/types.js"
import type { Credentials } from "../credentials.js"
import { MutualTLSChannelError } from "../errors/MutualTLSChannelError.js"
import type { ResolvedClientOptions } from "../options.js"

/**
 * A callback-style unary method as exposed by a gRPC stub
 */
export type UnaryMethod<TRequest, TResponse> = (
  request: TRequest,
  metadata: grpc.Metadata,
  options: grpc.CallOptions,
  callback: (error: grpc.ServiceError | null, response?: TResponse) => void,
) => grpc.ClientUnaryCall

/**
 * gRPC stub for the ClusterController service
 *
 * Each method corresponds to an RPC defined in clusters.proto.
 */
export interface ClusterControllerStub {
  /** Start creating a cluster */
  CreateCluster: UnaryMethod<CreateClusterRequest, Operation>

  /** Start updating the fields named by `update_mask` */
  UpdateCluster: UnaryMethod<UpdateClusterRequest, Operation>

  /** Start deleting a cluster */
  DeleteCluster: UnaryMethod<DeleteClusterRequest, Operation>

  GetCluster: UnaryMethod<GetClusterRequest, Cluster>

  /** One page of clusters */
  ListClusters: UnaryMethod<ListClustersRequest, ListClustersResponse>

  /** Start collecting diagnostic data */
  DiagnoseCluster: UnaryMethod<DiagnoseClusterRequest, Operation>

  close(): void
}

/**
 * gRPC stub for the WorkflowTemplateService service
 *
 * Each method corresponds to an RPC defined in workflow_templates.proto.
 */
export interface WorkflowTemplateServiceStub {
  CreateWorkflowTemplate: UnaryMethod<CreateWorkflowTemplateRequest, WorkflowTemplate>

  GetWorkflowTemplate: UnaryMethod<GetWorkflowTemplateRequest, WorkflowTemplate>

  /** Start a workflow from a stored template */
  InstantiateWorkflowTemplate: UnaryMethod<
    InstantiateWorkflowTemplateRequest,
    Operation
  >

  /** Start a workflow from a template sent along with the request */
  InstantiateInlineWorkflowTemplate: UnaryMethod<
    InstantiateInlineWorkflowTemplateRequest,
    Operation
  >

  UpdateWorkflowTemplate: UnaryMethod<UpdateWorkflowTemplateRequest, WorkflowTemplate>

  /** One page of workflow templates */
  ListWorkflowTemplates: UnaryMethod<
    ListWorkflowTemplatesRequest,
    ListWorkflowTemplatesResponse
  >

  DeleteWorkflowTemplate: UnaryMethod<DeleteWorkflowTemplateRequest, Empty>

  close(): void
}

const PROTO_FILES = [
  "dataproc/v1/clusters.proto",
  "dataproc/v1/workflow_templates.proto",
]

const CHANNEL_OPTIONS = {
  "grpc.max_send_message_length": -1,
  "grpc.max_receive_message_length": -1,
} satisfies grpc.ChannelOptions

let packageDefinition: protoLoader.PackageDefinition | null = null

/**
 * Load the proto definitions (once per process)
 *
 * Protos are resolved relative to this file, so the same lookup works from
 * src/ and from the compiled output.
 */
function loadProtos(): protoLoader.PackageDefinition {
  if (!packageDefinition) {
    const currentFilePath = fileURLToPath(import.meta.url)
    const protoRoot = path.join(path.dirname(currentFilePath), "../../../proto")

    packageDefinition = protoLoader.loadSync(PROTO_FILES, {
      includeDirs: [protoRoot],
      keepCase: true,
      longs: String,
      enums: String,
      defaults: true,
      oneofs: true,
    })
  }
  return packageDefinition
}

function createServiceClient<TStub>(
  service: string,
  host: string,
  credentials: grpc.ChannelCredentials,
): TStub {
  const definition = loadProtos()[`dataproc.v1.${service}`]
  if (!definition || "format" in definition) {
    throw new Error(`service dataproc.v1.${service} is missing from the proto definitions`)
  }

  const ServiceClient = grpc.makeGenericClientConstructor(definition, service)

  // Methods are generated from the proto definition at run time; the stub
  // interfaces above describe them.
  return new ServiceClient(host, credentials, CHANNEL_OPTIONS) as unknown as TStub
}

/**
 * Create a gRPC client for the ClusterController service
 *
 * @param host - host:port to connect to
 * @param credentials - channel credentials, see {@link createChannelCredentials}
 */
export function createClusterControllerClient(
  host: string,
  credentials: grpc.ChannelCredentials,
): ClusterControllerStub {
  return createServiceClient<ClusterControllerStub>(
    "ClusterController",
    host,
    credentials,
  )
}

/**
 * Create a gRPC client for the WorkflowTemplateService service
 *
 * @param host - host:port to connect to
 * @param credentials - channel credentials, see {@link createChannelCredentials}
 */
export function createWorkflowTemplateServiceClient(
  host: string,
  credentials: grpc.ChannelCredentials,
): WorkflowTemplateServiceStub {
  return createServiceClient<WorkflowTemplateServiceStub>(
    "WorkflowTemplateService",
    host,
    credentials,
  )
}

/**
 * Create channel credentials
 *
 * Plaintext when `insecure` is set. Otherwise TLS against the system roots,
 * presenting the client certificate when a certificate source resolved.
 *
 * @throws MutualTLSChannelError if the client certificate cannot be loaded
 */
export function createChannelCredentials(
  options: Pick<ResolvedClientOptions, "insecure" | "clientCertSource">,
): grpc.ChannelCredentials {
  if (options.insecure) {
    return grpc.credentials.createInsecure()
  }

  if (!options.clientCertSource) {
    return grpc.credentials.createSsl()
  }

  try {
    const { certChain, privateKey } = options.clientCertSource()
    return grpc.credentials.createSsl(null, privateKey, certChain)
  } catch (e) {
    throw new MutualTLSChannelError("failed to load client certificate for mutual TLS", {
      cause: e,
    })
  }
}

/**
 * Create metadata with authentication
 *
 * Access tokens are sent as a Bearer `authorization` header, API keys as
 * `x-goog-api-key`. Anonymous credentials add nothing.
 *
 * @param credentials - Resolved credentials
 * @param quotaProjectId - Project billed for quota, sent as `x-goog-user-project`
 * @returns gRPC Metadata to send with every call
 */
export function createAuthMetadata(
  credentials: Credentials,
  quotaProjectId?: string,
): grpc.Metadata {
  const metadata = new grpc.Metadata()

  switch (credentials.type) {
    case "access_token":
      metadata.add("authorization", `Bearer ${credentials.token}`)
      break
    case "api_key":
      metadata.add("x-goog-api-key", credentials.key)
      break
    case "anonymous":
      break
  }

  if (quotaProjectId) {
    metadata.add("x-goog-user-project", quotaProjectId)
  }

  return metadata
}

export interface UnaryCallOptions {
  deadline?: grpc.Deadline
  /** Cancels the call when aborted */
  signal?: AbortSignal
}

/**
 * Helper to promisify unary gRPC calls
 *
 * Converts callback-based unary gRPC methods to Promise-based API
 * for easier use with async/await. A `ServiceError` rejects the promise as
 * is; a cancelled call rejects with status CANCELLED.
 *
 * @param method - The gRPC method to call
 * @param request - The request object
 * @param metadata - gRPC metadata (auth, routing, etc.)
 * @returns Promise that resolves with the response
 */
export function callUnary<TRequest, TResponse>(
  method: UnaryMethod<TRequest, TResponse>,
  request: TRequest,
  metadata: grpc.Metadata,
  options: UnaryCallOptions = {},
): Promise<TResponse> {
  const { signal } = options

  return new Promise((resolve, reject) => {
    let settled = false
    const onAbort = () => call.cancel()

    const call = method(
      request,
      metadata,
      { deadline: options.deadline },
      (error, response) => {
        settled = true
        signal?.removeEventListener("abort", onAbort)

        if (error) {
          reject(error)
        } else if (response === undefined) {
          reject(new Error("unary call completed without a response"))
        } else {
          resolve(response)
        }
      },
    )

    if (settled || !signal) {
      return
    }
    if (signal.aborted) {
      call.cancel()
    } else {
      signal.addEventListener("abort", onAbort, { once: true })
    }
  })
}
