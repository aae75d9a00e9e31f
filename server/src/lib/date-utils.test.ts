import { describe, it, expect } from "vitest"
import { formatDate, parseReleaseDate } from "./date-utils.js"

describe("date-utils", () => {
  describe("formatDate", () => {
    it("formats a UTC date to YYYY-MM-DD", () => {
      const date = new Date(Date.UTC(2024, 2, 15, 12, 0, 0)) // March 15, 2024
      expect(formatDate(date)).toBe("2024-03-15")
    })

    it("handles single-digit months and days with zero padding", () => {
      const date = new Date(Date.UTC(2024, 0, 5, 12, 0, 0))
      expect(formatDate(date)).toBe("2024-01-05")
    })
  })

  describe("parseReleaseDate", () => {
    it("keeps a valid calendar date", () => {
      expect(parseReleaseDate("1999-10-15")).toBe("1999-10-15")
    })

    it("trims surrounding whitespace", () => {
      expect(parseReleaseDate(" 2010-07-16 ")).toBe("2010-07-16")
    })

    it("accepts leap days in leap years", () => {
      expect(parseReleaseDate("2024-02-29")).toBe("2024-02-29")
    })

    it("rejects impossible dates", () => {
      expect(parseReleaseDate("2021-02-30")).toBeNull()
      expect(parseReleaseDate("2023-02-29")).toBeNull()
      expect(parseReleaseDate("2020-13-01")).toBeNull()
    })

    it("rejects other formats", () => {
      expect(parseReleaseDate("2020")).toBeNull()
      expect(parseReleaseDate("15/10/1999")).toBeNull()
      expect(parseReleaseDate("1999-10-15T00:00:00Z")).toBeNull()
    })

    it("returns null for empty or missing values", () => {
      expect(parseReleaseDate("")).toBeNull()
      expect(parseReleaseDate(null)).toBeNull()
      expect(parseReleaseDate(undefined)).toBeNull()
    })

    it("returns null for non-string values", () => {
      expect(parseReleaseDate(19991015)).toBeNull()
    })

    it("rejects two-digit-era years that Date.UTC would shift", () => {
      expect(parseReleaseDate("0099-01-01")).toBeNull()
    })
  })
})
