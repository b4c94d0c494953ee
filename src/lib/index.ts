export { Config } from "./config/config";
export { resolveToken } from "./config/credentials";
export { loadCommandConfig } from "./config/loader";
export { Context } from "./context";

export { applyFrontmatter, frontmatter } from "./export/frontmatter";
export type { FrontmatterOptions, FrontmatterResult } from "./export/frontmatter";
export { Exporter, planTree } from "./export/exporter";
export type { ExporterOptions, ExportResult, PlannedEntry } from "./export/exporter";
export { ExportStats } from "./export/stats";

export { HierarchyBuilder } from "./hierarchy/builder";
export type { HierarchyIssue, HierarchyOptions } from "./hierarchy/builder";
export { PageNode } from "./hierarchy/page-node";

export { assemble } from "./markdown/assembler";
export { BlockConverter } from "./markdown/block-converter";
export { renderDatabase } from "./markdown/database";
export type { DatabaseTable } from "./markdown/database";
export { FeatureLog } from "./markdown/features";
export type { UnsupportedFeature } from "./markdown/features";
export { richText } from "./markdown/rich-text";
export type * from "./markdown/types";

export { NotionClient } from "./notion/client";
export { NotionObjectType } from "./notion/types";
export type { NotionObjectMetadata, WorkspaceSource } from "./notion/types";

export { collectPaginatedAPI, iteratePaginatedAPI, retry } from "./operations";

export { ExportReport } from "./report/report";
export { log } from "./log";
export { normalization } from "./util/normalization";
