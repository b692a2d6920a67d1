import type {
  CreateWorkflowTemplateRequest,
  DeleteWorkflowTemplateRequest,
  Empty,
  GetWorkflowTemplateRequest,
  InstantiateInlineWorkflowTemplateRequest,
  InstantiateWorkflowTemplateRequest,
  ListWorkflowTemplatesRequest,
  ListWorkflowTemplatesResponse,
  Operation,
  UpdateWorkflowTemplateRequest,
  WorkflowTemplate,
} from "../grpc/types.js"
import type { CallMetadata } from "../common/pagination/types.js"
import { ServiceClient, type CallOptions } from "./base_client.js"
import { ListWorkflowTemplatesPager } from "./pagers.js"

export type CreateWorkflowTemplateFields = Partial<
  Pick<CreateWorkflowTemplateRequest, "parent" | "template">
>
export type GetWorkflowTemplateFields = Partial<Pick<GetWorkflowTemplateRequest, "name">>
export type InstantiateWorkflowTemplateFields = Partial<
  Pick<InstantiateWorkflowTemplateRequest, "name" | "parameters">
>
export type InstantiateInlineWorkflowTemplateFields = Partial<
  Pick<InstantiateInlineWorkflowTemplateRequest, "parent" | "template">
>
export type UpdateWorkflowTemplateFields = Partial<
  Pick<UpdateWorkflowTemplateRequest, "template">
>
export type ListWorkflowTemplatesFields = Partial<
  Pick<ListWorkflowTemplatesRequest, "parent">
>
export type DeleteWorkflowTemplateFields = Partial<
  Pick<DeleteWorkflowTemplateRequest, "name">
>

/**
 * Client for the WorkflowTemplateService service
 *
 * Every call carries a routing header naming the template or its parent.
 * As on `ClusterControllerClient`, a method takes either a request
 * object or `null` followed by flattened fields.
 */
export class WorkflowTemplateServiceClient extends ServiceClient {
  createWorkflowTemplate(
    request?: CreateWorkflowTemplateRequest | null,
    fields: CreateWorkflowTemplateFields = {},
    options: CallOptions = {},
  ): Promise<WorkflowTemplate> {
    const message: CreateWorkflowTemplateRequest = this.requestOrFields(
      "createWorkflowTemplate",
      request,
      fields,
    ) ?? {
      parent: fields.parent ?? "",
      template: fields.template ?? {},
    }

    const stub = this.transport.getWorkflowTemplateService()
    return this.unary(
      "CreateWorkflowTemplate",
      stub.CreateWorkflowTemplate.bind(stub),
      message,
      this.callMetadata(options, { parent: message.parent }),
      options,
    )
  }

  /**
   * Get a template, by default its latest version
   */
  getWorkflowTemplate(
    request?: GetWorkflowTemplateRequest | null,
    fields: GetWorkflowTemplateFields = {},
    options: CallOptions = {},
  ): Promise<WorkflowTemplate> {
    const message: GetWorkflowTemplateRequest = this.requestOrFields(
      "getWorkflowTemplate",
      request,
      fields,
    ) ?? {
      name: fields.name ?? "",
    }

    const stub = this.transport.getWorkflowTemplateService()
    return this.unary(
      "GetWorkflowTemplate",
      stub.GetWorkflowTemplate.bind(stub),
      message,
      this.callMetadata(options, { name: message.name }),
      options,
    )
  }

  /**
   * Start a workflow from a stored template
   *
   * @returns The operation tracking the workflow run
   */
  instantiateWorkflowTemplate(
    request?: InstantiateWorkflowTemplateRequest | null,
    fields: InstantiateWorkflowTemplateFields = {},
    options: CallOptions = {},
  ): Promise<Operation> {
    const message: InstantiateWorkflowTemplateRequest = this.requestOrFields(
      "instantiateWorkflowTemplate",
      request,
      fields,
    ) ?? {
      name: fields.name ?? "",
      parameters: fields.parameters ?? {},
    }

    const stub = this.transport.getWorkflowTemplateService()
    return this.unary(
      "InstantiateWorkflowTemplate",
      stub.InstantiateWorkflowTemplate.bind(stub),
      message,
      this.callMetadata(options, { name: message.name }),
      options,
    )
  }

  /**
   * Start a workflow from a template that is not stored
   *
   * @returns The operation tracking the workflow run
   */
  instantiateInlineWorkflowTemplate(
    request?: InstantiateInlineWorkflowTemplateRequest | null,
    fields: InstantiateInlineWorkflowTemplateFields = {},
    options: CallOptions = {},
  ): Promise<Operation> {
    const message: InstantiateInlineWorkflowTemplateRequest = this.requestOrFields(
      "instantiateInlineWorkflowTemplate",
      request,
      fields,
    ) ?? {
      parent: fields.parent ?? "",
      template: fields.template ?? {},
    }

    const stub = this.transport.getWorkflowTemplateService()
    return this.unary(
      "InstantiateInlineWorkflowTemplate",
      stub.InstantiateInlineWorkflowTemplate.bind(stub),
      message,
      this.callMetadata(options, { parent: message.parent }),
      options,
    )
  }

  /**
   * Replace a template. The server rejects the update unless
   * `template.version` matches the current version.
   */
  updateWorkflowTemplate(
    request?: UpdateWorkflowTemplateRequest | null,
    fields: UpdateWorkflowTemplateFields = {},
    options: CallOptions = {},
  ): Promise<WorkflowTemplate> {
    const message: UpdateWorkflowTemplateRequest = this.requestOrFields(
      "updateWorkflowTemplate",
      request,
      fields,
    ) ?? {
      template: fields.template ?? {},
    }

    const stub = this.transport.getWorkflowTemplateService()
    return this.unary(
      "UpdateWorkflowTemplate",
      stub.UpdateWorkflowTemplate.bind(stub),
      message,
      this.callMetadata(options, { "template.name": message.template.name ?? "" }),
      options,
    )
  }

  /**
   * List the templates under a region
   *
   * Fetches the first page before resolving. The routing header is part of
   * the pager's metadata, so every page fetch carries it.
   */
  async listWorkflowTemplates(
    request?: ListWorkflowTemplatesRequest | null,
    fields: ListWorkflowTemplatesFields = {},
    options: CallOptions = {},
  ): Promise<ListWorkflowTemplatesPager> {
    const message: ListWorkflowTemplatesRequest = this.requestOrFields(
      "listWorkflowTemplates",
      request,
      fields,
    ) ?? {
      parent: fields.parent ?? "",
    }

    const stub = this.transport.getWorkflowTemplateService()
    const metadata = this.callMetadata(options, { parent: message.parent })

    const method = (
      pageRequest: ListWorkflowTemplatesRequest,
      pageMetadata: CallMetadata,
    ): Promise<ListWorkflowTemplatesResponse> =>
      this.unary(
        "ListWorkflowTemplates",
        stub.ListWorkflowTemplates.bind(stub),
        pageRequest,
        pageMetadata,
        options,
      )

    const response = await method(message, metadata)

    return new ListWorkflowTemplatesPager(method, {
      request: message,
      response,
      metadata,
      signal: options.signal,
      logger: this.logger,
    })
  }

  deleteWorkflowTemplate(
    request?: DeleteWorkflowTemplateRequest | null,
    fields: DeleteWorkflowTemplateFields = {},
    options: CallOptions = {},
  ): Promise<Empty> {
    const message: DeleteWorkflowTemplateRequest = this.requestOrFields(
      "deleteWorkflowTemplate",
      request,
      fields,
    ) ?? {
      name: fields.name ?? "",
    }

    const stub = this.transport.getWorkflowTemplateService()
    return this.unary(
      "DeleteWorkflowTemplate",
      stub.DeleteWorkflowTemplate.bind(stub),
      message,
      this.callMetadata(options, { name: message.name }),
      options,
    )
  }
}
