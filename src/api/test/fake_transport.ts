import * as grpc from "@grpc/grpc-js"

import type {
  ClusterControllerStub,
  ServiceTransport,
  UnaryMethod,
  WorkflowTemplateServiceStub,
} from "../../common/grpc/index.js"

export interface RecordedCall {
  rpc: string
  request: unknown
  metadata: grpc.Metadata
  options: grpc.CallOptions
}

export type Reply<T> = { response: T } | { error: grpc.ServiceError }

export function serviceError(code: grpc.status, details: string): grpc.ServiceError {
  return Object.assign(new Error(`${code} ${grpc.status[code]}: ${details}`), {
    code,
    details,
    metadata: new grpc.Metadata(),
  })
}

function unexpected(rpc: string): UnaryMethod<unknown, never> {
  return () => {
    throw new Error(`unexpected ${rpc} call`)
  }
}

/**
 * Stands in for a stub method: records every call and answers from `queue`
 * on the next turn of the event loop. Cancelling a call that has not been
 * answered fails it with CANCELLED.
 */
export function replies<TRequest, TResponse>(
  rpc: string,
  calls: RecordedCall[],
  ...queue: Array<Reply<TResponse>>
): UnaryMethod<TRequest, TResponse> {
  return (request, metadata, options, callback) => {
    calls.push({ rpc, request, metadata, options })
    const reply = queue.shift()

    let done = false
    const finish = (settle: () => void) => {
      if (!done) {
        done = true
        settle()
      }
    }

    setImmediate(() =>
      finish(() => {
        if (!reply) {
          callback(serviceError(grpc.status.INTERNAL, `no reply left for ${rpc}`))
        } else if ("error" in reply) {
          callback(reply.error)
        } else {
          callback(null, reply.response)
        }
      }),
    )

    return {
      cancel() {
        finish(() => callback(serviceError(grpc.status.CANCELLED, "Cancelled on client")))
      },
    } as grpc.ClientUnaryCall
  }
}

/**
 * In-process transport whose stubs answer from scripted replies. Every call
 * is authenticated with `authorization: Bearer test-token`.
 */
export class FakeTransport implements ServiceTransport {
  readonly host = "dataproc.test:443"
  closed = 0

  private readonly clusterController: ClusterControllerStub
  private readonly workflowTemplateService: WorkflowTemplateServiceStub
  private readonly metadata = new grpc.Metadata()

  constructor(
    stubs: {
      clusters?: Partial<ClusterControllerStub>
      templates?: Partial<WorkflowTemplateServiceStub>
    } = {},
  ) {
    this.metadata.add("authorization", "Bearer test-token")

    this.clusterController = {
      CreateCluster: unexpected("CreateCluster"),
      UpdateCluster: unexpected("UpdateCluster"),
      DeleteCluster: unexpected("DeleteCluster"),
      GetCluster: unexpected("GetCluster"),
      ListClusters: unexpected("ListClusters"),
      DiagnoseCluster: unexpected("DiagnoseCluster"),
      close: () => undefined,
      ...stubs.clusters,
    }
    this.workflowTemplateService = {
      CreateWorkflowTemplate: unexpected("CreateWorkflowTemplate"),
      GetWorkflowTemplate: unexpected("GetWorkflowTemplate"),
      InstantiateWorkflowTemplate: unexpected("InstantiateWorkflowTemplate"),
      InstantiateInlineWorkflowTemplate: unexpected("InstantiateInlineWorkflowTemplate"),
      UpdateWorkflowTemplate: unexpected("UpdateWorkflowTemplate"),
      ListWorkflowTemplates: unexpected("ListWorkflowTemplates"),
      DeleteWorkflowTemplate: unexpected("DeleteWorkflowTemplate"),
      close: () => undefined,
      ...stubs.templates,
    }
  }

  getClusterController(): ClusterControllerStub {
    return this.clusterController
  }

  getWorkflowTemplateService(): WorkflowTemplateServiceStub {
    return this.workflowTemplateService
  }

  getMetadata(): grpc.Metadata {
    return this.metadata
  }

  close(): void {
    this.closed++
  }
}
