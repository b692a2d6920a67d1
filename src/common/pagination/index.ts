export { Pager } from "./pager.js"
export { AsyncPager } from "./async_pager.js"
export type { AsyncPagerInit } from "./async_pager.js"
export { BasePager } from "./base.js"
export { withPageToken } from "./types.js"
export type {
  AsyncPageMethod,
  CallMetadata,
  PageMethod,
  PageRequest,
  PageResponse,
  PagerInit,
  PagerState,
} from "./types.js"
