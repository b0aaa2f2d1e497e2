import { FakeClock } from "@docbase/clock"
import type { Logger } from "@docbase/logger"
import { MockAgent } from "undici"
import { mock } from "vitest-mock-extended"
import { TransportError } from "../../../errors"
import type { Mock } from "../../../tests/mock"
import { UndiciTransport } from "../undici-transport"

const ORIGIN = "https://database.deta.sh"
const JSON_HEADERS = { headers: { "content-type": "application/json" } }

describe("UndiciTransport", () => {
  let agent: MockAgent
  let logger: Mock<Logger>
  let transport: UndiciTransport

  beforeEach(() => {
    agent = new MockAgent()
    agent.disableNetConnect()
    logger = mock<Logger>()

    transport = new UndiciTransport(
      { clock: new FakeClock(0), logger, dispatcher: agent },
      {
        host: "database.deta.sh",
        projectId: "proj",
        projectKey: "proj_test-secret",
        collection: "users",
        timeoutMs: 1_000,
      },
    )
  })

  afterEach(async () => {
    await agent.close()
  })

  it("sends the project key and decodes JSON", async () => {
    agent
      .get(ORIGIN)
      .intercept({
        path: "/v1/proj/users/items/a",
        method: "GET",
        headers: { "x-api-key": "proj_test-secret" },
      })
      .reply(200, { key: "a", n: 1 }, JSON_HEADERS)

    await expect(transport.request("/items/a", "GET")).resolves.toEqual({
      status: 200,
      body: { key: "a", n: 1 },
    })
    agent.assertNoPendingInterceptors()
  })

  it("serialises the body with its content type", async () => {
    agent
      .get(ORIGIN)
      .intercept({
        path: "/v1/proj/users/items",
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({ item: { value: "hello" } }),
      })
      .reply(201, { key: "generated", value: "hello" }, JSON_HEADERS)

    const res = await transport.request("/items", "POST", { item: { value: "hello" } })

    expect(res).toEqual({ status: 201, body: { key: "generated", value: "hello" } })
  })

  it("resolves for error statuses", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/v1/proj/users/items/missing", method: "GET" })
      .reply(404, { errors: ["Key not found"] }, JSON_HEADERS)

    await expect(transport.request("/items/missing", "GET")).resolves.toEqual({
      status: 404,
      body: { errors: ["Key not found"] },
    })
  })

  it("returns null for an empty body", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/v1/proj/users/items/a", method: "DELETE" })
      .reply(200, "", JSON_HEADERS)

    await expect(transport.request("/items/a", "DELETE")).resolves.toEqual({
      status: 200,
      body: null,
    })
  })

  it("returns text for non-JSON and malformed JSON bodies", async () => {
    const pool = agent.get(ORIGIN)
    pool
      .intercept({ path: "/v1/proj/users/items/a", method: "GET" })
      .reply(502, "Bad Gateway", { headers: { "content-type": "text/plain" } })
    pool
      .intercept({ path: "/v1/proj/users/items/b", method: "GET" })
      .reply(200, "{not json", JSON_HEADERS)

    await expect(transport.request("/items/a", "GET")).resolves.toEqual({
      status: 502,
      body: "Bad Gateway",
    })
    await expect(transport.request("/items/b", "GET")).resolves.toEqual({
      status: 200,
      body: "{not json",
    })
  })

  it("logs each completed request", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/v1/proj/users/query", method: "POST" })
      .reply(200, { paging: { size: 0 } }, JSON_HEADERS)

    await transport.request("/query", "POST", { limit: 1000, last: null })

    expect(logger.debug).toHaveBeenCalledWith("Request completed", {
      method: "POST",
      path: "/query",
      status: 200,
      durationMs: 0,
    })
  })

  it("raises TransportError when no response arrives", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/v1/proj/users/items/a", method: "GET" })
      .replyWithError(new Error("socket hang up"))

    const err = await transport.request("/items/a", "GET").catch((e: unknown) => e)

    expect(err).toBeInstanceOf(TransportError)
    expect(err).toMatchObject({
      code: "transport_error",
      isRetryable: true,
      context: { method: "GET", path: "/items/a" },
    })
    expect(logger.error).toHaveBeenCalledWith(
      "Request failed",
      expect.objectContaining({ method: "GET", path: "/items/a", durationMs: 0 }),
    )
  })
})
