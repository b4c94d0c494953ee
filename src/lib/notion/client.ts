import { APIErrorCode, Client, isFullBlock, isFullDatabase, isFullPage } from "@notionhq/client";
import type {
  BlockObjectResponse,
  ListBlockChildrenParameters,
  PageObjectResponse,
  PartialBlockObjectResponse,
  QueryDatabaseParameters,
  SearchParameters
} from "@notionhq/client/build/src/api-endpoints";
import type { DatabaseTable } from "$lib/markdown/database";
import type { Block } from "$lib/markdown/types";
import { collectPaginatedAPI, retry } from "$lib/operations";
import { ErrorFactory, errorMessage, NotionApiError, RateLimitError } from "$shared/errors";
import { log } from "../log";
import { transformers } from "./transformers";
import type { NotionClientConfig, NotionObjectMetadata, WorkspaceSource } from "./types";

const NETWORK_ERROR_CODES = ["ECONNRESET", "ENOTFOUND", "ETIMEDOUT", "ECONNREFUSED", "EAI_AGAIN"];

const codeOf = (error: unknown): string =>
  typeof error === "object" && error !== null && "code" in error && typeof error.code === "string"
    ? error.code
    : "UNKNOWN_ERROR";

/**
 * Workspace access through the official SDK.
 *
 * Every call is retried on transient failures and rejects with a domain error.
 */
export class NotionClient implements WorkspaceSource {
  private client: Client;
  private retries: number;
  private retryDelay: number;
  private pageSize: number;

  constructor(config: NotionClientConfig) {
    this.client = new Client({
      auth: config.apiKey,
      baseUrl: config.baseUrl,
      timeoutMs: config.timeout
    });
    this.retries = config.retries ?? 3;
    this.retryDelay = config.retryDelay ?? 1000;
    this.pageSize = config.pageSize ?? 100;
  }

  async getPage(pageId: string): Promise<NotionObjectMetadata> {
    const response = await this.execute(`pages.retrieve for ${pageId}`, () =>
      this.client.pages.retrieve({ page_id: pageId })
    );

    if (!isFullPage(response)) {
      throw new NotionApiError(`Page ${pageId} is not accessible.`, APIErrorCode.ObjectNotFound, { pageId });
    }

    return transformers.page(response);
  }

  async getDatabase(databaseId: string): Promise<NotionObjectMetadata> {
    const response = await this.execute(`databases.retrieve for ${databaseId}`, () =>
      this.client.databases.retrieve({ database_id: databaseId })
    );

    if (!isFullDatabase(response)) {
      throw new NotionApiError(`Database ${databaseId} is not accessible.`, APIErrorCode.ObjectNotFound, {
        databaseId
      });
    }

    return transformers.database(response);
  }

  async getBlockChildren(blockId: string): Promise<Block[]> {
    const raw = await this.listChildren(blockId);
    const blocks: Block[] = [];

    for (const item of raw) {
      blocks.push(transformers.block(item));

      if (isFullBlock(item) && item.type === "table" && item.has_children) {
        const rows = await this.listChildren(item.id);
        blocks.push(...rows.map(transformers.block));
      }
    }

    return blocks;
  }

  async searchPages(): Promise<NotionObjectMetadata[]> {
    const results = await this.execute("search for pages", () =>
      collectPaginatedAPI(
        (args: SearchParameters) => this.client.search(args),
        { filter: { property: "object" as const, value: "page" as const } },
        this.pageSize
      )
    );

    return results.filter(isFullPage).map(transformers.page);
  }

  async queryDatabase(databaseId: string): Promise<DatabaseTable> {
    const database = await this.execute(`databases.retrieve for ${databaseId}`, () =>
      this.client.databases.retrieve({ database_id: databaseId })
    );

    if (!isFullDatabase(database)) {
      throw new NotionApiError(`Database ${databaseId} is not accessible.`, APIErrorCode.ObjectNotFound, {
        databaseId
      });
    }

    const entries = await this.execute(`databases.query for ${databaseId}`, () =>
      collectPaginatedAPI((args: QueryDatabaseParameters) => this.client.databases.query(args), { database_id: databaseId }, this.pageSize)
    );

    const pages: PageObjectResponse[] = [];
    for (const entry of entries) {
      if (isFullPage(entry)) pages.push(entry);
    }

    return transformers.table(database, pages);
  }

  private listChildren(blockId: string): Promise<(BlockObjectResponse | PartialBlockObjectResponse)[]> {
    return this.execute(`blocks.children.list for ${blockId}`, () =>
      collectPaginatedAPI((args: ListBlockChildrenParameters) => this.client.blocks.children.list(args), { block_id: blockId }, this.pageSize)
    );
  }

  private async execute<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    log.trace(`Executing Notion API call`, { operation });

    try {
      return await retry({ fn, operation, maxRetries: this.retries, baseDelay: this.retryDelay });
    } catch (error) {
      log.debug(`Notion API call failed`, { operation, error: errorMessage(error) });
      throw this.transformError(error);
    }
  }

  private transformError(error: unknown): Error {
    const code = codeOf(error);

    if (code === APIErrorCode.RateLimited) {
      return new RateLimitError("Rate limit exceeded.", 60);
    }

    switch (code) {
      case APIErrorCode.Unauthorized:
        return new NotionApiError("Invalid API key or insufficient permissions.", code);
      case APIErrorCode.RestrictedResource:
        return new NotionApiError("The integration has no access to this resource.", code);
      case APIErrorCode.ObjectNotFound:
        return new NotionApiError("Object not found.", code);
      case APIErrorCode.ValidationError:
        return new NotionApiError("Invalid request parameters.", code);
      case APIErrorCode.ConflictError:
        return new NotionApiError("Conflict with current state.", code);
      case APIErrorCode.InternalServerError:
        return new NotionApiError("Notion internal server error.", code);
      case APIErrorCode.ServiceUnavailable:
        return new NotionApiError("Notion service unavailable.", code);
    }

    if (NETWORK_ERROR_CODES.includes(code)) {
      return ErrorFactory.fromNetworkError(error);
    }

    return ErrorFactory.fromNotionError(error);
  }
}
