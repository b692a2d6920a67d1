import { PagerStateError } from "../errors/PagerStateError.js"
import type { Logger } from "../logger.js"
import {
  withPageToken,
  type CallMetadata,
  type PageRequest,
  type PageResponse,
  type PagerInit,
  type PagerState,
} from "./types.js"

/**
 * State shared by the sync and async pagers: the request to resend, the one
 * response currently held, and the state machine guarding page fetches.
 */
export abstract class BasePager<
  TRequest extends PageRequest,
  TResponse extends PageResponse,
  TItem,
> {
  protected request: TRequest
  protected current: TResponse
  protected readonly metadata: CallMetadata
  protected readonly itemsOf: (page: TResponse) => readonly TItem[]
  private readonly logger?: Logger
  private _state: PagerState = "holding_page"
  private pageNumber = 1

  protected constructor(init: PagerInit<TRequest, TResponse, TItem>) {
    this.request = { ...init.request }
    this.current = init.response
    this.metadata = init.metadata ?? []
    this.itemsOf = init.items
    this.logger = init.logger
  }

  /**
   * The most recent response. Only this one is retained.
   */
  get response(): TResponse {
    return this.current
  }

  get state(): PagerState {
    return this._state
  }

  /**
   * Continuation token of the current response, `""` on the last page.
   */
  get nextPageToken(): string {
    return this.current.next_page_token ?? ""
  }

  hasMore(): boolean {
    return this.nextPageToken !== ""
  }

  /**
   * Read a field of the current response.
   *
   * @example
   * ```typescript
   * const pager = await client.listClusters({ project_id: "p", region: "r" })
   * pager.get("next_page_token")
   * ```
   */
  get<K extends keyof TResponse>(field: K): TResponse[K] {
    return this.current[field]
  }

  toString(): string {
    return `${this.constructor.name}<${JSON.stringify(this.current)}>`
  }

  protected assertUsable(): void {
    if (this._state === "failed") {
      throw new PagerStateError("pager cannot advance after a failed page fetch", {
        state: this._state,
      })
    }
    if (this._state === "fetching") {
      throw new PagerStateError("a page fetch is already in flight", {
        state: this._state,
      })
    }
  }

  /**
   * Move to `fetching` and return the request for the next page.
   */
  protected beginFetch(): TRequest {
    this.assertUsable()
    this.request = withPageToken(this.request, this.nextPageToken)
    this._state = "fetching"
    return this.request
  }

  protected completeFetch(response: TResponse): TResponse {
    this.current = response
    this._state = "holding_page"
    this.pageNumber++

    this.logger?.debug(
      {
        pager: this.constructor.name,
        page: this.pageNumber,
        items: this.itemsOf(response).length,
        hasMore: this.hasMore(),
      },
      "page fetched",
    )

    return response
  }

  protected failFetch(error: unknown): void {
    this._state = "failed"
    this.logger?.debug(
      { pager: this.constructor.name, page: this.pageNumber + 1, err: error },
      "page fetch failed",
    )
  }
}
