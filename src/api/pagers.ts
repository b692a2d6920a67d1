import { AsyncPager, type AsyncPagerInit } from "../common/pagination/async_pager.js"
import type { AsyncPageMethod } from "../common/pagination/types.js"
import type {
  Cluster,
  ListClustersRequest,
  ListClustersResponse,
  ListWorkflowTemplatesRequest,
  ListWorkflowTemplatesResponse,
  WorkflowTemplate,
} from "../grpc/types.js"

/**
 * A pager for iterating through `listClusters` results.
 *
 * Wraps the first {@link ListClustersResponse} and iterates its `clusters`
 * field. When the response has a `next_page_token`, iteration makes further
 * `ListClusters` calls and continues with their `clusters`.
 *
 * Fields of the most recent response are available through `get()` and
 * `response`.
 */
export class ListClustersPager extends AsyncPager<
  ListClustersRequest,
  ListClustersResponse,
  Cluster
> {
  constructor(
    method: AsyncPageMethod<ListClustersRequest, ListClustersResponse>,
    init: Omit<AsyncPagerInit<ListClustersRequest, ListClustersResponse, Cluster>, "items">,
  ) {
    super(method, { ...init, items: (page) => page.clusters })
  }
}

/**
 * A pager for iterating through `listWorkflowTemplates` results.
 *
 * Same contract as {@link ListClustersPager}, over the `templates` field of
 * {@link ListWorkflowTemplatesResponse}.
 */
export class ListWorkflowTemplatesPager extends AsyncPager<
  ListWorkflowTemplatesRequest,
  ListWorkflowTemplatesResponse,
  WorkflowTemplate
> {
  constructor(
    method: AsyncPageMethod<ListWorkflowTemplatesRequest, ListWorkflowTemplatesResponse>,
    init: Omit<
      AsyncPagerInit<
        ListWorkflowTemplatesRequest,
        ListWorkflowTemplatesResponse,
        WorkflowTemplate
      >,
      "items"
    >,
  ) {
    super(method, { ...init, items: (page) => page.templates })
  }
}
