import { PagerCancelledError } from "../errors/PagerCancelledError.js"
import { BasePager } from "./base.js"
import type {
  AsyncPageMethod,
  PageRequest,
  PageResponse,
  PagerInit,
} from "./types.js"

export interface AsyncPagerInit<TRequest, TResponse, TItem>
  extends PagerInit<TRequest, TResponse, TItem> {
  /**
   * Aborting while a page fetch is pending rejects that fetch with
   * {@link PagerCancelledError} and leaves the pager `failed`.
   */
  signal?: AbortSignal
}

/**
 * Iterates the items of a paged call whose call method returns a promise.
 *
 * Pages are fetched one at a time in token order. Starting a second fetch
 * while one is pending throws a `PagerStateError`.
 *
 * @example
 * ```typescript
 * const pager = await client.listClusters({ project_id: "p", region: "r" })
 *
 * for await (const cluster of pager) {
 *   console.log(cluster.cluster_name)
 * }
 *
 * // or page by page
 * for await (const page of pager.pages) {
 *   console.log(page.clusters.length, page.next_page_token)
 * }
 * ```
 */
export class AsyncPager<
    TRequest extends PageRequest,
    TResponse extends PageResponse,
    TItem,
  >
  extends BasePager<TRequest, TResponse, TItem>
  implements AsyncIterable<TItem>
{
  private readonly method: AsyncPageMethod<TRequest, TResponse>
  private readonly signal?: AbortSignal

  constructor(
    method: AsyncPageMethod<TRequest, TResponse>,
    init: AsyncPagerInit<TRequest, TResponse, TItem>,
  ) {
    super(init)
    this.method = method
    this.signal = init.signal
  }

  get pages(): AsyncIterableIterator<TResponse> {
    return this.iteratePages()
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<TItem, void, undefined> {
    for await (const page of this.pages) {
      yield* this.itemsOf(page)
    }
  }

  private async *iteratePages(): AsyncGenerator<TResponse, void, undefined> {
    this.assertUsable()
    yield this.current

    while (this.hasMore()) {
      yield await this.nextPage()
    }
  }

  private async nextPage(): Promise<TResponse> {
    const request = this.beginFetch()

    let response: TResponse
    try {
      response = await abortable(
        () => this.method(request, this.metadata),
        this.signal,
      )
    } catch (error) {
      this.failFetch(error)
      throw error
    }

    return this.completeFetch(response)
  }
}

/**
 * Settle with `start()` unless `signal` aborts first. A call that settles after
 * the abort is ignored.
 */
function abortable<T>(
  start: () => Promise<T>,
  signal: AbortSignal | undefined,
): Promise<T> {
  if (!signal) {
    return start()
  }
  if (signal.aborted) {
    return Promise.reject(cancelled(signal))
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(cancelled(signal))
    signal.addEventListener("abort", onAbort, { once: true })

    void start().then(
      (value) => {
        signal.removeEventListener("abort", onAbort)
        resolve(value)
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort)
        reject(error)
      },
    )
  })
}

function cancelled(signal: AbortSignal): PagerCancelledError {
  return new PagerCancelledError("page fetch cancelled", { cause: signal.reason })
}
