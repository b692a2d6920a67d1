// Service clients
export { ClusterControllerClient } from "./api/cluster_controller.js"
export type {
  CreateClusterFields,
  DeleteClusterFields,
  DiagnoseClusterFields,
  GetClusterFields,
  ListClustersFields,
  UpdateClusterFields,
} from "./api/cluster_controller.js"
export { WorkflowTemplateServiceClient } from "./api/workflow_template_service.js"
export type {
  CreateWorkflowTemplateFields,
  DeleteWorkflowTemplateFields,
  GetWorkflowTemplateFields,
  InstantiateInlineWorkflowTemplateFields,
  InstantiateWorkflowTemplateFields,
  ListWorkflowTemplatesFields,
  UpdateWorkflowTemplateFields,
} from "./api/workflow_template_service.js"
export { ServiceClient, routingHeader, ROUTING_HEADER_KEY } from "./api/base_client.js"
export type { CallOptions } from "./api/base_client.js"
export { ListClustersPager, ListWorkflowTemplatesPager } from "./api/pagers.js"
export * from "./api/resource_paths.js"

// Message types
export type * from "./grpc/types.js"

// Pagination
export * from "./common/pagination/index.js"

// Connection, credentials and configuration
export * from "./common/grpc/index.js"
export {
  AnonymousCredentials,
  credentialsFromFile,
  credentialsFromInfo,
  resolveCredentials,
} from "./common/credentials.js"
export type { Credentials, CredentialsInfo, CredentialSources } from "./common/credentials.js"
export {
  defaultClientCertSource,
  getDefaultMtlsEndpoint,
  resolveClientOptions,
  withDefaultPort,
} from "./common/options.js"
export type {
  ClientCertSource,
  ClientOptions,
  ResolvedClientOptions,
  ServiceEndpoints,
} from "./common/options.js"
export { createLogger } from "./common/logger.js"
export type { Logger } from "./common/logger.js"

// Common errors
export * from "./common/errors/index.js"
