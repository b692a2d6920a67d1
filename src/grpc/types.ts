/**
 * TypeScript types for the Dataproc gRPC services
 * Based on proto/dataproc/v1/*.proto
 *
 * Protos are loaded with `keepCase` and `defaults`, so field names stay
 * snake_case and responses carry every scalar, repeated and map field even when
 * the server left it unset. Unset message fields arrive as `null`.
 */

/**
 * A long-running operation returned by mutating calls
 */
export interface Operation {
  name: string
  done: boolean
  error?: OperationError | null
  metadata?: Record<string, string>
}

export interface OperationError {
  code: number
  message: string
}

/**
 * Empty message returned by deletes
 */
export interface Empty {
  // Empty message
}

/**
 * Cluster state as reported by the service
 */
export type ClusterState =
  | "UNKNOWN"
  | "CREATING"
  | "RUNNING"
  | "ERROR"
  | "DELETING"
  | "UPDATING"
  | "STOPPING"
  | "STOPPED"
  | "STARTING"

export interface Cluster {
  project_id?: string
  cluster_name?: string
  config?: ClusterConfig | null
  labels?: Record<string, string>
  status?: ClusterStatus | null
  status_history?: ClusterStatus[]
  /** Assigned by the service on creation */
  cluster_uuid?: string
}

export interface ClusterConfig {
  config_bucket?: string
  temp_bucket?: string
  master_config?: InstanceGroupConfig | null
  worker_config?: InstanceGroupConfig | null
  software_config?: SoftwareConfig | null
}

export interface InstanceGroupConfig {
  num_instances?: number
  instance_names?: string[]
  image_uri?: string
  machine_type_uri?: string
}

export interface SoftwareConfig {
  image_version?: string
  properties?: Record<string, string>
}

export interface ClusterStatus {
  state?: ClusterState
  detail?: string
  /** RFC 3339 timestamp */
  state_start_time?: string
}

export interface CreateClusterRequest {
  project_id: string
  region: string
  cluster: Cluster
  /** Makes retried creates idempotent */
  request_id?: string
}

export interface UpdateClusterRequest {
  project_id: string
  region: string
  cluster_name: string
  cluster: Cluster
  /** Field paths of `cluster` to update, e.g. "config.worker_config.num_instances" */
  update_mask: string[]
  request_id?: string
}

export interface DeleteClusterRequest {
  project_id: string
  region: string
  cluster_name: string
  /** Fail unless the cluster still has this UUID */
  cluster_uuid?: string
  request_id?: string
}

export interface GetClusterRequest {
  project_id: string
  region: string
  cluster_name: string
}

export interface ListClustersRequest {
  project_id: string
  region: string
  /** e.g. "status.state = ACTIVE AND labels.env = staging" */
  filter?: string
  page_size?: number
  page_token?: string
}

export interface ListClustersResponse {
  clusters: Cluster[]
  /** Empty on the last page */
  next_page_token: string
}

export interface DiagnoseClusterRequest {
  project_id: string
  region: string
  cluster_name: string
}

export interface WorkflowTemplate {
  id?: string
  /** Resource name, see `workflowTemplatePath` */
  name?: string
  version?: number
  create_time?: string
  update_time?: string
  labels?: Record<string, string>
  placement?: WorkflowTemplatePlacement | null
  jobs?: OrderedJob[]
}

/**
 * Where a workflow runs: on a cluster it creates, or on an existing cluster
 * picked by labels
 */
export interface WorkflowTemplatePlacement {
  managed_cluster?: ManagedCluster | null
  cluster_selector?: ClusterSelector | null
}

export interface ManagedCluster {
  cluster_name?: string
  labels?: Record<string, string>
}

export interface ClusterSelector {
  zone?: string
  cluster_labels?: Record<string, string>
}

export interface OrderedJob {
  step_id?: string
  /** e.g. "hadoop", "spark", "pyspark", "hive" */
  job_type?: string
  main_file_uri?: string
  args?: string[]
  labels?: Record<string, string>
  prerequisite_step_ids?: string[]
}

export interface CreateWorkflowTemplateRequest {
  parent: string
  template: WorkflowTemplate
}

export interface GetWorkflowTemplateRequest {
  name: string
  /** 0 or unset means the latest version */
  version?: number
}

export interface InstantiateWorkflowTemplateRequest {
  name: string
  version?: number
  request_id?: string
  parameters?: Record<string, string>
}

export interface InstantiateInlineWorkflowTemplateRequest {
  parent: string
  template: WorkflowTemplate
  request_id?: string
}

export interface UpdateWorkflowTemplateRequest {
  template: WorkflowTemplate
}

export interface ListWorkflowTemplatesRequest {
  parent: string
  page_size?: number
  page_token?: string
}

export interface ListWorkflowTemplatesResponse {
  templates: WorkflowTemplate[]
  /** Empty on the last page */
  next_page_token: string
}

export interface DeleteWorkflowTemplateRequest {
  name: string
  version?: number
}
