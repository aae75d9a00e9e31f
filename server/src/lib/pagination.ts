/**
 * Pagination utilities for API route handlers and local queries.
 */

import { ValidationError } from "./errors.js"

export interface PaginationInfo {
  page: number
  pageSize: number
  totalCount: number
  totalPages: number
}

/**
 * Parse the `page` query parameter. Absent means page 1; anything other than
 * a positive integer is rejected.
 */
export function parsePageParam(queryPage: unknown): number {
  if (queryPage === undefined) return 1
  if (typeof queryPage !== "string" || !/^\d+$/.test(queryPage)) {
    throw new ValidationError("page must be a positive integer")
  }
  const page = parseInt(queryPage, 10)
  if (page < 1 || !Number.isSafeInteger(page)) {
    throw new ValidationError("page must be a positive integer")
  }
  return page
}

/**
 * Calculate offset for SQL OFFSET clause.
 */
export function calculateOffset(page: number, pageSize: number): number {
  return (page - 1) * pageSize
}

/**
 * Number of pages needed for totalCount items (ceiling division).
 */
export function calculateTotalPages(totalCount: number, pageSize: number): number {
  return Math.ceil(totalCount / pageSize)
}

/**
 * Build a complete pagination info object.
 * @param page - Current page number (1-indexed)
 * @param pageSize - Items per page
 * @param totalCount - Total number of items
 */
export function buildPagination(page: number, pageSize: number, totalCount: number): PaginationInfo {
  return {
    page,
    pageSize,
    totalCount,
    totalPages: calculateTotalPages(totalCount, pageSize),
  }
}
