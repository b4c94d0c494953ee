import type { DatabaseTable } from "$lib/markdown/database";
import type { Block } from "$lib/markdown/types";

export enum NotionObjectType {
  PAGE = "page",
  DATABASE = "database"
}

export type NotionParentType = "database" | "page" | "block" | "workspace";

/**
 * What the exporter needs to know about a page or database.
 */
export interface NotionObjectMetadata {
  id: string;
  title: string;
  objectType: NotionObjectType;
  parentType: NotionParentType;
  createdTime: string;
  lastEditedTime: string;
}

/**
 * Read access to a workspace. Any failure rejects the returned promise.
 */
export interface WorkspaceSource {
  getPage(pageId: string): Promise<NotionObjectMetadata>;
  getDatabase(databaseId: string): Promise<NotionObjectMetadata>;
  /**
   * Ordered child blocks. Rows of a table directly follow their table block.
   */
  getBlockChildren(blockId: string): Promise<Block[]>;
  /**
   * Every page shared with the integration.
   */
  searchPages(): Promise<NotionObjectMetadata[]>;
  queryDatabase(databaseId: string): Promise<DatabaseTable>;
}

export type NotionClientConfig = {
  apiKey: string;
  baseUrl?: string;
  timeout?: number;
  retries?: number;
  /**
   * Base delay of the retry backoff, in milliseconds.
   */
  retryDelay?: number;
  pageSize?: number;
};
