/**
 * gRPC client infrastructure
 *
 * This module provides the stub factories, channel credentials, auth
 * metadata and connection management used by the service clients.
 *
 * @module grpc
 */

export {
  callUnary,
  createAuthMetadata,
  createChannelCredentials,
  createClusterControllerClient,
  createWorkflowTemplateServiceClient,
} from "./client.js"
export type {
  ClusterControllerStub,
  UnaryCallOptions,
  UnaryMethod,
  WorkflowTemplateServiceStub,
} from "./client.js"
export { GRPCConnectionManager } from "./connection.js"
export type { ServiceTransport } from "./connection.js"
