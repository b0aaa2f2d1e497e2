import { InvalidArgumentError } from "../../errors"
import { parseBaseConfig } from "../base-config"

describe("parseBaseConfig", () => {
  it("fills defaults and derives the project id from the key", () => {
    const config = parseBaseConfig({ name: "users", projectKey: "proj_test-secret" })

    expect(config).toEqual({
      name: "users",
      projectKey: "proj_test-secret",
      projectId: "proj",
      host: "database.deta.sh",
      timeoutMs: 300_000,
      logging: { level: "warn", prettify: false },
    })
  })

  it("splits on the first underscore only", () => {
    expect(parseBaseConfig({ name: "u", projectKey: "a_b_c" }).projectId).toBe("a")
  })

  it("keeps an explicit project id", () => {
    const config = parseBaseConfig({
      name: "users",
      projectKey: "test-secret",
      projectId: "other",
      host: "db.internal.test",
      timeoutMs: 5_000,
      logging: { level: "debug" },
    })

    expect(config.projectId).toBe("other")
    expect(config.host).toBe("db.internal.test")
    expect(config.timeoutMs).toBe(5_000)
    expect(config.logging).toEqual({ level: "debug", prettify: false })
  })

  it("returns a frozen value", () => {
    const config = parseBaseConfig({ name: "users", projectKey: "proj_test-secret" })

    expect(Object.isFrozen(config)).toBe(true)
    expect(Object.isFrozen(config.logging)).toBe(true)
  })

  it.each(["test-secret", "_test-secret"])(
    "rejects key %s when no project id can be derived",
    (projectKey) => {
      expect(() => parseBaseConfig({ name: "users", projectKey })).toThrow(
        "invalid base config: projectKey: expected '<projectId>_<secret>' when projectId is not given",
      )
    },
  )

  it("rejects an empty collection name", () => {
    expect(() => parseBaseConfig({ name: "", projectKey: "proj_test-secret" })).toThrow(
      "invalid base config: name: must be a non-empty string",
    )
  })

  it("lists every issue in the error context", () => {
    try {
      parseBaseConfig({
        name: "users",
        projectKey: "proj_test-secret",
        timeoutMs: 0,
        logging: { level: "verbose" as never },
      })
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidArgumentError)
      const issues = (err as InvalidArgumentError).context.issues
      expect(issues).toEqual([
        expect.objectContaining({ path: "timeoutMs" }),
        expect.objectContaining({ path: "logging.level" }),
      ])
    }
  })
})
