import { log } from "$lib/log";
import type { Block } from "$lib/markdown/types";
import type { WorkspaceSource } from "$notion/types";
import { errorMessage } from "$shared/errors";
import { PageNode } from "./page-node";

export const DEFAULT_MAX_DEPTH = 10;

export type HierarchyIssueKind = "cycle" | "depth" | "fetch";

/**
 * A branch that was dropped, or a page whose children could not be listed.
 */
export interface HierarchyIssue {
  kind: HierarchyIssueKind;
  id: string;
  message: string;
}

export interface HierarchyOptions {
  /**
   * Nodes at this depth (the root is depth 0) are dropped.
   */
  maxDepth?: number;
}

type NodeKind = "page" | "database";

/**
 * Discovers the page tree below one page, or below every workspace-level page.
 *
 * Each call to `build` is one discovery pass with its own visited set.
 */
export class HierarchyBuilder {
  readonly issues: HierarchyIssue[] = [];
  private readonly maxDepth: number;

  constructor(
    private readonly source: WorkspaceSource,
    options: HierarchyOptions = {}
  ) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  async build(rootId?: string): Promise<PageNode[]> {
    const visited = new Set<string>();
    const ids = rootId ? [rootId] : await this.roots();
    const forest: PageNode[] = [];

    for (const id of ids) {
      const node = await this.node(id, "page", visited, 0, null);
      if (node) forest.push(node);
    }

    return forest;
  }

  /**
   * Ids of pages whose parent is the workspace itself.
   */
  async roots(): Promise<string[]> {
    try {
      const pages = await this.source.searchPages();
      return pages.filter((page) => page.parentType === "workspace").map((page) => page.id);
    } catch (error) {
      this.issue("fetch", "workspace", `Failed to search workspace pages: ${errorMessage(error)}`);
      return [];
    }
  }

  private async node(
    id: string,
    kind: NodeKind,
    visited: Set<string>,
    depth: number,
    parentId: string | null
  ): Promise<PageNode | null> {
    if (visited.has(id)) {
      this.issue("cycle", id, `Cycle detected at ${id}, skipping`);
      return null;
    }

    if (depth >= this.maxDepth) {
      this.issue("depth", id, `Max depth ${this.maxDepth} reached at ${id}, skipping`);
      return null;
    }

    visited.add(id);

    let node: PageNode;
    try {
      const metadata = kind === "database" ? await this.source.getDatabase(id) : await this.source.getPage(id);
      node = PageNode.from(metadata, parentId);
    } catch (error) {
      this.issue("fetch", id, `Failed to fetch ${kind} ${id}: ${errorMessage(error)}`);
      return null;
    }

    if (node.isDatabase) {
      return node;
    }

    let blocks: Block[];
    try {
      blocks = await this.source.getBlockChildren(id);
    } catch (error) {
      this.issue("fetch", id, `Failed to list children of ${id}: ${errorMessage(error)}`);
      return node;
    }

    for (const block of blocks) {
      if (block.type !== "child_page" && block.type !== "child_database") continue;

      const child = await this.node(
        block.id,
        block.type === "child_page" ? "page" : "database",
        visited,
        depth + 1,
        node.id
      );
      if (child) node.children.push(child);
    }

    log.debug(`discovered ${node.title}`, { id, depth, children: node.children.length });

    return node;
  }

  private issue(kind: HierarchyIssueKind, id: string, message: string) {
    this.issues.push({ kind, id, message });

    if (kind === "fetch") {
      log.error(message);
    } else {
      log.warning(message);
    }
  }
}
