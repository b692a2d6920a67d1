import type {
  Cluster,
  CreateClusterRequest,
  DeleteClusterRequest,
  DiagnoseClusterRequest,
  GetClusterRequest,
  ListClustersRequest,
  ListClustersResponse,
  Operation,
  UpdateClusterRequest,
} from "../grpc/types.js"
import type { CallMetadata } from "../common/pagination/types.js"
import { ServiceClient, type CallOptions } from "./base_client.js"
import { ListClustersPager } from "./pagers.js"

export type CreateClusterFields = Partial<
  Pick<CreateClusterRequest, "project_id" | "region" | "cluster">
>
export type UpdateClusterFields = Partial<
  Pick<
    UpdateClusterRequest,
    "project_id" | "region" | "cluster_name" | "cluster" | "update_mask"
  >
>
export type DeleteClusterFields = Partial<
  Pick<DeleteClusterRequest, "project_id" | "region" | "cluster_name">
>
export type GetClusterFields = Partial<
  Pick<GetClusterRequest, "project_id" | "region" | "cluster_name">
>
export type ListClustersFields = Partial<
  Pick<ListClustersRequest, "project_id" | "region" | "filter">
>
export type DiagnoseClusterFields = Partial<
  Pick<DiagnoseClusterRequest, "project_id" | "region" | "cluster_name">
>

/**
 * Client for the ClusterController service
 *
 * Every method takes either a full request object or, with `null` in its
 * place, the request's most used fields flattened into the second argument.
 * Fields left out of the flattened form are sent with their default values.
 *
 * @example
 * ```typescript
 * const client = new ClusterControllerClient({
 *   credentials: { type: "access_token", token: process.env["TOKEN"] ?? "" },
 * })
 *
 * const pager = await client.listClusters(null, {
 *   project_id: "my-project",
 *   region: "europe-west1",
 * })
 * for await (const cluster of pager) {
 *   console.log(cluster.cluster_name, cluster.status?.state)
 * }
 *
 * client.close()
 * ```
 */
export class ClusterControllerClient extends ServiceClient {
  /**
   * Start creating a cluster
   *
   * @returns The operation tracking the creation
   */
  createCluster(
    request?: CreateClusterRequest | null,
    fields: CreateClusterFields = {},
    options: CallOptions = {},
  ): Promise<Operation> {
    const message: CreateClusterRequest = this.requestOrFields(
      "createCluster",
      request,
      fields,
    ) ?? {
      project_id: fields.project_id ?? "",
      region: fields.region ?? "",
      cluster: fields.cluster ?? {},
    }

    const stub = this.transport.getClusterController()
    return this.unary(
      "CreateCluster",
      stub.CreateCluster.bind(stub),
      message,
      this.callMetadata(options),
      options,
    )
  }

  /**
   * Start updating a cluster
   *
   * Only the fields named in `update_mask` are changed.
   *
   * @returns The operation tracking the update
   */
  updateCluster(
    request?: UpdateClusterRequest | null,
    fields: UpdateClusterFields = {},
    options: CallOptions = {},
  ): Promise<Operation> {
    const message: UpdateClusterRequest = this.requestOrFields(
      "updateCluster",
      request,
      fields,
    ) ?? {
      project_id: fields.project_id ?? "",
      region: fields.region ?? "",
      cluster_name: fields.cluster_name ?? "",
      cluster: fields.cluster ?? {},
      update_mask: fields.update_mask ?? [],
    }

    const stub = this.transport.getClusterController()
    return this.unary(
      "UpdateCluster",
      stub.UpdateCluster.bind(stub),
      message,
      this.callMetadata(options),
      options,
    )
  }

  /**
   * Start deleting a cluster
   *
   * @returns The operation tracking the deletion
   */
  deleteCluster(
    request?: DeleteClusterRequest | null,
    fields: DeleteClusterFields = {},
    options: CallOptions = {},
  ): Promise<Operation> {
    const message: DeleteClusterRequest = this.requestOrFields(
      "deleteCluster",
      request,
      fields,
    ) ?? {
      project_id: fields.project_id ?? "",
      region: fields.region ?? "",
      cluster_name: fields.cluster_name ?? "",
    }

    const stub = this.transport.getClusterController()
    return this.unary(
      "DeleteCluster",
      stub.DeleteCluster.bind(stub),
      message,
      this.callMetadata(options),
      options,
    )
  }

  getCluster(
    request?: GetClusterRequest | null,
    fields: GetClusterFields = {},
    options: CallOptions = {},
  ): Promise<Cluster> {
    const message: GetClusterRequest = this.requestOrFields(
      "getCluster",
      request,
      fields,
    ) ?? {
      project_id: fields.project_id ?? "",
      region: fields.region ?? "",
      cluster_name: fields.cluster_name ?? "",
    }

    const stub = this.transport.getClusterController()
    return this.unary(
      "GetCluster",
      stub.GetCluster.bind(stub),
      message,
      this.callMetadata(options),
      options,
    )
  }

  /**
   * List the clusters of a project region
   *
   * Fetches the first page before resolving. Further pages are fetched while
   * the returned pager is iterated, with the same metadata, timeout and signal.
   */
  async listClusters(
    request?: ListClustersRequest | null,
    fields: ListClustersFields = {},
    options: CallOptions = {},
  ): Promise<ListClustersPager> {
    const message: ListClustersRequest = this.requestOrFields(
      "listClusters",
      request,
      fields,
    ) ?? {
      project_id: fields.project_id ?? "",
      region: fields.region ?? "",
      filter: fields.filter ?? "",
    }

    const stub = this.transport.getClusterController()
    const metadata = this.callMetadata(options)

    const method = (
      pageRequest: ListClustersRequest,
      pageMetadata: CallMetadata,
    ): Promise<ListClustersResponse> =>
      this.unary(
        "ListClusters",
        stub.ListClusters.bind(stub),
        pageRequest,
        pageMetadata,
        options,
      )

    const response = await method(message, metadata)

    return new ListClustersPager(method, {
      request: message,
      response,
      metadata,
      signal: options.signal,
      logger: this.logger,
    })
  }

  /**
   * Start collecting diagnostic data from a cluster
   *
   * @returns The operation tracking the diagnosis
   */
  diagnoseCluster(
    request?: DiagnoseClusterRequest | null,
    fields: DiagnoseClusterFields = {},
    options: CallOptions = {},
  ): Promise<Operation> {
    const message: DiagnoseClusterRequest = this.requestOrFields(
      "diagnoseCluster",
      request,
      fields,
    ) ?? {
      project_id: fields.project_id ?? "",
      region: fields.region ?? "",
      cluster_name: fields.cluster_name ?? "",
    }

    const stub = this.transport.getClusterController()
    return this.unary(
      "DiagnoseCluster",
      stub.DiagnoseCluster.bind(stub),
      message,
      this.callMetadata(options),
      options,
    )
  }
}
