import { ValidationError } from "./errors";

const PAGE_NUMBER = /^\d+$/;

function parsePageNumber(raw: string, label: string): number {
  const value = raw.trim();
  if (!PAGE_NUMBER.test(value)) {
    throw new ValidationError(`Invalid page ${label}: ${raw}`);
  }
  return Number.parseInt(value, 10);
}

/**
 * Parse a page range expression such as `"1-3,5,7-"` into 0-based page indices.
 *
 * Tokens are a single 1-based page (`5`), a closed range (`1-3`), an open-ended
 * range (`7-`, through the last page) or a range from the first page (`-4`).
 * Closed ranges running past the last page are truncated. Duplicates are dropped
 * keeping the first occurrence, so the result follows selection order.
 *
 * @param expression - The range expression; blank or missing selects every page
 * @param totalPages - Page count of the source document
 * @returns Selected 0-based page indices
 * @throws ValidationError when a token is malformed, out of bounds or selects nothing
 */
export function parsePageRanges(expression: string | undefined, totalPages: number): number[] {
  if (!expression || !expression.trim()) {
    return Array.from({ length: totalPages }, (_, index) => index);
  }

  const indices: number[] = [];
  for (const rawToken of expression.split(",")) {
    const token = rawToken.trim();
    if (!token) {
      continue;
    }

    const dash = token.indexOf("-");
    if (dash === -1) {
      const index = parsePageNumber(token, "number") - 1;
      if (index < 0 || index >= totalPages) {
        throw new ValidationError(`Page out of bounds: ${token}`);
      }
      indices.push(index);
      continue;
    }

    const startRaw = token.slice(0, dash);
    const endRaw = token.slice(dash + 1);
    const start = startRaw.trim() ? parsePageNumber(startRaw, "start") - 1 : 0;
    const end = endRaw.trim() ? parsePageNumber(endRaw, "end") - 1 : totalPages - 1;

    if (start < 0 || end < 0 || start > end) {
      throw new ValidationError(`Invalid range: ${token}`);
    }
    if (start >= totalPages) {
      throw new ValidationError(`Page out of bounds: ${token}`);
    }

    for (let index = start; index <= Math.min(end, totalPages - 1); index += 1) {
      indices.push(index);
    }
  }

  const unique = [...new Set(indices)];
  if (unique.length === 0) {
    throw new ValidationError("Page selection is empty");
  }
  return unique;
}

/**
 * Check that `order` lists every 1-based page of a `totalPages` document exactly once.
 */
export function isFullPermutation(order: readonly number[], totalPages: number): boolean {
  if (order.length !== totalPages) {
    return false;
  }

  const sorted = [...order].sort((left, right) => left - right);
  return sorted.every((value, index) => value === index + 1);
}
