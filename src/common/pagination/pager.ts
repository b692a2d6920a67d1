import { BasePager } from "./base.js"
import type { PageMethod, PageRequest, PageResponse, PagerInit } from "./types.js"

/**
 * Iterates the items of a paged call whose call method returns synchronously.
 *
 * The first response is fetched by the caller. Every further page costs one
 * call to `method`, made only when iteration reaches it.
 *
 * @example
 * ```typescript
 * const pager = new Pager(listLocal, {
 *   request,
 *   response: listLocal(request, []),
 *   items: (page) => page.clusters,
 * })
 *
 * for (const cluster of pager) {
 *   console.log(cluster.cluster_name)
 * }
 * ```
 */
export class Pager<TRequest extends PageRequest, TResponse extends PageResponse, TItem>
  extends BasePager<TRequest, TResponse, TItem>
  implements Iterable<TItem>
{
  private readonly method: PageMethod<TRequest, TResponse>

  constructor(
    method: PageMethod<TRequest, TResponse>,
    init: PagerInit<TRequest, TResponse, TItem>,
  ) {
    super(init)
    this.method = method
  }

  /**
   * Pages in token order, starting with the current one. Forward only: a
   * second pass starts from whatever page the pager holds by then.
   */
  get pages(): IterableIterator<TResponse> {
    return this.iteratePages()
  }

  *[Symbol.iterator](): Generator<TItem, void, undefined> {
    for (const page of this.pages) {
      yield* this.itemsOf(page)
    }
  }

  private *iteratePages(): Generator<TResponse, void, undefined> {
    this.assertUsable()
    yield this.current

    while (this.hasMore()) {
      yield this.nextPage()
    }
  }

  private nextPage(): TResponse {
    const request = this.beginFetch()

    let response: TResponse
    try {
      response = this.method(request, this.metadata)
    } catch (error) {
      this.failFetch(error)
      throw error
    }

    return this.completeFetch(response)
  }
}
