import { APIErrorCode, ClientErrorCode, isNotionClientError } from "@notionhq/client";
import { log } from "./log";

/**
 * Network error codes that should trigger a retry.
 */
const RETRYABLE_ERROR_CODES = ["ECONNRESET", "ETIMEDOUT", "ECONNREFUSED", "ENOTFOUND", "EAI_AGAIN"];

const RETRYABLE_API_CODES: readonly string[] = [
  APIErrorCode.RateLimited,
  APIErrorCode.ConflictError,
  APIErrorCode.InternalServerError,
  APIErrorCode.ServiceUnavailable,
  ClientErrorCode.RequestTimeout
];

const codeOf = (error: unknown): string | undefined => {
  if (typeof error !== "object" || error === null) return undefined;
  if ("code" in error && typeof error.code === "string") return error.code;
  if ("cause" in error) return codeOf(error.cause);
  return undefined;
};

/**
 * Check if an error is retryable.
 *
 * @param error - The error to check.
 *
 * @returns True if the error is retryable, false otherwise.
 */
export const isRetryableError = (error: unknown): boolean => {
  if (!error) return false;

  if (isNotionClientError(error)) {
    return RETRYABLE_API_CODES.includes(error.code);
  }

  const code = codeOf(error);
  if (code && (RETRYABLE_API_CODES.includes(code) || RETRYABLE_ERROR_CODES.includes(code))) {
    return true;
  }

  const message = error instanceof Error ? error.message : String(error);
  return RETRYABLE_ERROR_CODES.some((c) => message.includes(c));
};

/**
 * Calculate exponential backoff delay.
 *
 * @param attempt - The current attempt number, starting at 0.
 * @param baseDelay - The base delay in milliseconds.
 * @param maxDelay - The maximum delay in milliseconds.
 *
 * @returns The calculated delay with ±25% jitter.
 */
export const calculateBackoffDelay = (attempt: number, baseDelay: number, maxDelay: number = 60000): number => {
  const capped = Math.min(Math.pow(2, attempt) * baseDelay, maxDelay);
  const jitter = capped * 0.25;

  return Math.max(baseDelay, Math.round(capped + (Math.random() - 0.5) * 2 * jitter));
};

export const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Retry an operation with exponential backoff when it fails with a retryable error.
 *
 * @returns The result of the first successful attempt.
 */
export const retry = async <T>(args: {
  fn: () => Promise<T>;
  operation: string;
  maxRetries?: number;
  baseDelay?: number;
}): Promise<T> => {
  const { fn, operation, maxRetries = 3, baseDelay = 1000 } = args;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isRetryableError(error) || attempt >= maxRetries) {
        throw error;
      }

      const wait = calculateBackoffDelay(attempt, baseDelay);
      log.debug(`retrying ${operation} in ${wait}ms (attempt ${attempt + 1}/${maxRetries})`);

      await delay(wait);
    }
  }
};

/**
 * A single page of a cursor-paginated list endpoint.
 */
export interface PaginatedResponse<R> {
  results: R[];
  next_cursor: string | null;
  has_more: boolean;
}

export interface PaginationArgs {
  start_cursor?: string;
  page_size?: number;
}

/**
 * Iterate over every result of a cursor-paginated endpoint.
 *
 * @param listFn - The function to fetch one page.
 * @param firstPageArgs - The arguments to pass to every page request.
 * @param pageSize - The size of each page.
 */
export async function* iteratePaginatedAPI<A extends PaginationArgs, R>(
  listFn: (args: A) => Promise<PaginatedResponse<R>>,
  firstPageArgs: A,
  pageSize: number
): AsyncGenerator<R, void, unknown> {
  let nextCursor: string | undefined = firstPageArgs.start_cursor;

  do {
    const response = await listFn({ ...firstPageArgs, start_cursor: nextCursor, page_size: pageSize });

    for (const result of response.results) {
      yield result;
    }

    nextCursor = response.has_more ? (response.next_cursor ?? undefined) : undefined;
  } while (nextCursor);
}

/**
 * Collects every result of a cursor-paginated endpoint.
 *
 * @param listFn - The function to fetch one page.
 * @param firstPageArgs - The arguments to pass to every page request.
 * @param pageSize - The size of each page.
 */
export const collectPaginatedAPI = async <A extends PaginationArgs, R>(
  listFn: (args: A) => Promise<PaginatedResponse<R>>,
  firstPageArgs: A,
  pageSize: number
): Promise<R[]> => {
  const results: R[] = [];

  for await (const item of iteratePaginatedAPI(listFn, firstPageArgs, pageSize)) {
    results.push(item);
  }

  return results;
};
