import { describe, it, expect, vi } from "vitest"
import jwt from "jsonwebtoken"

vi.mock("./logger.js", () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}))

import { generateAccessToken, hashPassword, verifyAccessToken, verifyPassword } from "./auth.js"

const config = { jwtSecret: "test-secret", jwtExpiresInSeconds: 3600, bcryptRounds: 4 }

describe("password hashing", () => {
  it("verifies the original password against its hash", async () => {
    const hash = await hashPassword("correct-password", config.bcryptRounds)

    expect(hash).not.toBe("correct-password")
    expect(await verifyPassword("correct-password", hash)).toBe(true)
    expect(await verifyPassword("wrong-password", hash)).toBe(false)
  })
})

describe("access tokens", () => {
  it("round-trips the user ID and username", () => {
    const token = generateAccessToken({ id: 42, username: "moviefan" }, config)

    expect(verifyAccessToken(token, config)).toEqual({ id: 42, username: "moviefan" })
  })

  it("uses the user ID as subject and the configured expiry", () => {
    const token = generateAccessToken({ id: 7, username: "viewer" }, config)
    const decoded = jwt.decode(token, { json: true })

    expect(decoded?.sub).toBe("7")
    expect((decoded?.exp ?? 0) - (decoded?.iat ?? 0)).toBe(3600)
  })

  it("rejects a token signed with another secret", () => {
    const token = generateAccessToken({ id: 1, username: "a" }, { ...config, jwtSecret: "other-secret" })

    expect(verifyAccessToken(token, config)).toBeNull()
  })

  it("rejects an expired token", () => {
    const token = jwt.sign({ username: "a" }, "test-secret", { subject: "1", expiresIn: -10 })

    expect(verifyAccessToken(token, config)).toBeNull()
  })

  it("rejects a token without a numeric subject", () => {
    const token = jwt.sign({ username: "a" }, "test-secret", { subject: "admin" })

    expect(verifyAccessToken(token, config)).toBeNull()
  })

  it("rejects garbage", () => {
    expect(verifyAccessToken("not.a.token", config)).toBeNull()
  })
})
