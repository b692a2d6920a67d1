import type { Logger } from "../logger.js"

/**
 * Ordered `[key, value]` pairs sent as metadata with every page fetch.
 */
export type CallMetadata = ReadonlyArray<readonly [string, string]>

/**
 * A request that carries a continuation token.
 */
export interface PageRequest {
  page_token?: string
}

/**
 * A response page. An empty or absent `next_page_token` means there are no
 * further pages.
 */
export interface PageResponse {
  next_page_token?: string
}

/**
 * Lifecycle of a pager.
 *
 * - `holding_page`: a current response is held, iteration may continue
 * - `fetching`: a page fetch is in flight
 * - `failed`: a page fetch failed or was cancelled; the pager is spent
 */
export type PagerState = "holding_page" | "fetching" | "failed"

export type PageMethod<TRequest, TResponse> = (
  request: TRequest,
  metadata: CallMetadata,
) => TResponse

export type AsyncPageMethod<TRequest, TResponse> = (
  request: TRequest,
  metadata: CallMetadata,
) => Promise<TResponse>

/**
 * Everything a pager needs besides the call method: the request that produced
 * `response`, the response itself and how to read its items.
 */
export interface PagerInit<TRequest, TResponse, TItem> {
  request: TRequest
  response: TResponse
  /** Selects the repeated items field of a page */
  items: (page: TResponse) => readonly TItem[]
  metadata?: CallMetadata
  logger?: Logger
}

/**
 * Copy `request` with its continuation token replaced. The original is left
 * untouched.
 */
export function withPageToken<TRequest extends PageRequest>(
  request: TRequest,
  pageToken: string,
): TRequest {
  return { ...request, page_token: pageToken }
}
