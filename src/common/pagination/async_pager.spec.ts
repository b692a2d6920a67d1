import assert from "assert"

import { PagerCancelledError } from "../errors/PagerCancelledError.js"
import { PagerStateError } from "../errors/PagerStateError.js"
import { AsyncPager } from "./async_pager.js"
import { Pager } from "./pager.js"
import type { AsyncPageMethod, CallMetadata } from "./types.js"

interface Item {
  id: string
}

interface ListItemsRequest {
  parent: string
  page_token?: string
}

interface ListItemsResponse {
  items: Item[]
  next_page_token: string
}

function page(ids: string[], token = ""): ListItemsResponse {
  return { items: ids.map((id) => ({ id })), next_page_token: token }
}

function followingPages(): ListItemsResponse[] {
  return [page([], "def"), page(["c1"], "ghi"), page(["d1", "d2"])]
}

class Deferred<T> {
  resolve: (value: T) => void = () => undefined
  reject: (reason: unknown) => void = () => undefined
  readonly promise = new Promise<T>((resolve, reject) => {
    this.resolve = resolve
    this.reject = reject
  })
}

const tick = () => new Promise((resolve) => setImmediate(resolve))

function scripted(responses: Array<ListItemsResponse | Error>) {
  const calls: Array<{ request: ListItemsRequest; metadata: CallMetadata }> = []
  const method: AsyncPageMethod<ListItemsRequest, ListItemsResponse> = async (
    request,
    metadata,
  ) => {
    calls.push({ request, metadata })
    const next = responses.shift()
    if (next === undefined) {
      throw new Error("no scripted response left")
    }
    if (next instanceof Error) {
      throw next
    }
    return next
  }
  return { method, calls }
}

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const result: T[] = []
  for await (const value of iterable) {
    result.push(value)
  }
  return result
}

describe("AsyncPager", function () {
  const request: ListItemsRequest = { parent: "projects/p" }
  const metadata: CallMetadata = [["x-trace", "t-1"]]

  function pagerFor(responses: Array<ListItemsResponse | Error>, signal?: AbortSignal) {
    const script = scripted(responses)
    const pager = new AsyncPager(script.method, {
      request,
      response: page(["a1", "a2", "a3"], "abc"),
      items: (p) => p.items,
      metadata,
      signal,
    })
    return { pager, calls: script.calls }
  }

  describe("pages", function () {
    it("should yield every page in token order", async function () {
      const { pager, calls } = pagerFor(followingPages())

      const pages = await collect(pager.pages)

      assert.deepStrictEqual(
        pages.map((p) => p.next_page_token),
        ["abc", "def", "ghi", ""],
      )
      assert.deepStrictEqual(
        calls.map((call) => call.request.page_token),
        ["abc", "def", "ghi"],
      )
      assert.strictEqual(request.page_token, undefined)
    })

    it("should pass the construction metadata to every call", async function () {
      const { pager, calls } = pagerFor(followingPages())

      await collect(pager.pages)

      assert.deepStrictEqual(
        calls.map((call) => call.metadata),
        [metadata, metadata, metadata],
      )
    })

    it("should make no call when the first page is the last", async function () {
      const { method, calls } = scripted([])
      const pager = new AsyncPager(method, {
        request,
        response: page(["x"]),
        items: (p) => p.items,
      })

      const ids = (await collect(pager)).map((item) => item.id)

      assert.deepStrictEqual(ids, ["x"])
      assert.strictEqual(calls.length, 0)
    })
  })

  describe("items", function () {
    it("should flatten pages in order", async function () {
      const { pager } = pagerFor(followingPages())

      const ids = (await collect(pager)).map((item) => item.id)

      assert.deepStrictEqual(ids, ["a1", "a2", "a3", "c1", "d1", "d2"])
    })

    it("should match the sync pager for the same responses", async function () {
      const syncScript = followingPages()
      const asyncScript = followingPages()
      const init = {
        request,
        response: page(["a1", "a2", "a3"], "abc"),
        items: (p: ListItemsResponse) => p.items,
      }

      const syncIds = [
        ...new Pager<ListItemsRequest, ListItemsResponse, Item>(
          () => syncScript.shift() ?? page([]),
          init,
        ),
      ].map((item) => item.id)
      const asyncIds = (
        await collect(
          new AsyncPager<ListItemsRequest, ListItemsResponse, Item>(
            async () => asyncScript.shift() ?? page([]),
            init,
          ),
        )
      ).map((item) => item.id)

      assert.deepStrictEqual(asyncIds, syncIds)
    })

    it("should deliver items of earlier pages before a failed fetch", async function () {
      const { pager } = pagerFor([page(["b1"], "def"), new Error("unavailable")])
      const seen: string[] = []

      await assert.rejects(async () => {
        for await (const item of pager) {
          seen.push(item.id)
        }
      }, /unavailable/)

      assert.deepStrictEqual(seen, ["a1", "a2", "a3", "b1"])
      assert.strictEqual(pager.state, "failed")
      await assert.rejects(pager.pages.next(), PagerStateError)
    })
  })

  describe("concurrent fetches", function () {
    it("should reject a second fetch while one is in flight", async function () {
      const gate = new Deferred<ListItemsResponse>()
      let calls = 0
      const pager = new AsyncPager<ListItemsRequest, ListItemsResponse, Item>(
        () => {
          calls++
          return gate.promise
        },
        { request, response: page(["a1"], "abc"), items: (p) => p.items },
      )

      const pages = pager.pages
      await pages.next()
      const pending = pages.next()
      await tick()

      assert.strictEqual(pager.state, "fetching")
      await assert.rejects(pager.pages.next(), (error: unknown) => {
        assert.ok(error instanceof PagerStateError)
        assert.strictEqual(error.state, "fetching")
        return true
      })
      assert.strictEqual(calls, 1)

      const second = page(["b1"])
      gate.resolve(second)

      assert.deepStrictEqual(await pending, { done: false, value: second })
      assert.strictEqual(pager.state, "holding_page")
      assert.strictEqual(calls, 1)
    })
  })

  describe("cancellation", function () {
    it("should reject a pending fetch when the signal aborts", async function () {
      const controller = new AbortController()
      const gate = new Deferred<ListItemsResponse>()
      const pager = new AsyncPager<ListItemsRequest, ListItemsResponse, Item>(
        () => gate.promise,
        {
          request,
          response: page(["a1"], "abc"),
          items: (p) => p.items,
          signal: controller.signal,
        },
      )
      const seen: string[] = []

      const consume = (async () => {
        for await (const item of pager) {
          seen.push(item.id)
        }
      })()
      await tick()
      assert.strictEqual(pager.state, "fetching")

      const reason = new Error("caller gave up")
      controller.abort(reason)

      await assert.rejects(consume, (error: unknown) => {
        assert.ok(error instanceof PagerCancelledError)
        assert.strictEqual(error.cause, reason)
        return true
      })
      assert.deepStrictEqual(seen, ["a1"])
      assert.strictEqual(pager.state, "failed")

      gate.resolve(page(["late"]))
      await tick()

      assert.deepStrictEqual(pager.response, page(["a1"], "abc"))
      await assert.rejects(pager.pages.next(), PagerStateError)
    })

    it("should not call the method once the signal has aborted", async function () {
      const controller = new AbortController()
      controller.abort()
      const { pager, calls } = pagerFor(followingPages(), controller.signal)

      const pages = pager.pages
      const first = await pages.next()

      assert.deepStrictEqual(first, {
        done: false,
        value: page(["a1", "a2", "a3"], "abc"),
      })
      await assert.rejects(pages.next(), PagerCancelledError)
      assert.strictEqual(calls.length, 0)
      assert.strictEqual(pager.state, "failed")
    })
  })
})
