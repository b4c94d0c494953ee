import { promises as fs } from "fs";
import path from "path";
import type { PageNode } from "$lib/hierarchy/page-node";
import { log } from "$lib/log";
import { assemble } from "$lib/markdown/assembler";
import { BlockConverter } from "$lib/markdown/block-converter";
import { renderDatabase } from "$lib/markdown/database";
import { FeatureLog } from "$lib/markdown/features";
import type { WorkspaceSource } from "$notion/types";
import { ErrorFactory, errorMessage } from "$shared/errors";
import type { normalization } from "$util/normalization";
import { frontmatter } from "./frontmatter";
import { INDEX_FILE, layout } from "./layout";
import { ExportStats } from "./stats";

export interface ExporterOptions {
  /**
   * Root directory of the export.
   */
  output: string;
  includeDatabases?: boolean;
  namingStrategy?: normalization.strategy;
  /**
   * Prepend YAML front matter to every document.
   */
  frontmatter?: boolean;
  /**
   * Row cap for database tables.
   */
  maxRows?: number;
  /**
   * Plan the export without fetching content or touching the file system.
   */
  dryRun?: boolean;
  exportDate?: Date;
}

export type PlannedEntryKind = "folder" | "index" | "file";

export interface PlannedEntry {
  kind: PlannedEntryKind;
  /**
   * Path relative to the export root.
   */
  path: string;
  depth: number;
  pageId: string;
}

export interface ExportResult {
  stats: ExportStats;
  features: FeatureLog;
  plan: PlannedEntry[];
  /**
   * Title of every page visited, by id.
   */
  titles: Map<string, string>;
}

const exists = async (file: string): Promise<boolean> => {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
};

/**
 * Draw planned entries as an indented tree.
 */
export const planTree = (plan: readonly PlannedEntry[]): string =>
  plan
    .map((entry) => {
      const name = path.basename(entry.path);
      const line = entry.kind === "folder" ? `📁 ${name}/` : `📄 ${name}`;
      return `${"  ".repeat(entry.depth)}${line}`;
    })
    .join("\n");

/**
 * Writes a page forest to disk: a page with children becomes a folder holding
 * `index.md`, a page without children a single `.md` file.
 *
 * One instance performs one export run.
 */
export class Exporter {
  private readonly stats = new ExportStats();
  private readonly features = new FeatureLog();
  private readonly plan: PlannedEntry[] = [];
  private readonly titles = new Map<string, string>();
  /**
   * Folders and files claimed during this run.
   */
  private readonly claimed = new Set<string>();

  constructor(
    private readonly source: WorkspaceSource,
    private readonly options: ExporterOptions
  ) {}

  async export(forest: readonly PageNode[]): Promise<ExportResult> {
    if (!this.options.dryRun) {
      try {
        await this.directory(this.options.output);
      } catch (error) {
        throw ErrorFactory.fromFileSystemError(error, `creating ${this.options.output}`);
      }
    }

    for (const node of forest) {
      await this.node(node, this.options.output, 0);
    }

    return { stats: this.stats, features: this.features, plan: this.plan, titles: this.titles };
  }

  private async node(node: PageNode, parent: string, depth: number): Promise<void> {
    this.titles.set(node.id, node.title);

    if (node.isDatabase && !this.options.includeDatabases) {
      log.debug(`skipping database ${node.title}`, { id: node.id });
      return;
    }

    let content = "";
    if (!this.options.dryRun) {
      try {
        content = await this.content(node);
      } catch (error) {
        this.fail(node, `Failed to fetch content: ${errorMessage(error)}`);
        return;
      }
    }

    if (node.hasChildren) {
      const folder = await this.unique(parent, layout.name(node, this.options.namingStrategy), "");
      const index = path.join(folder, INDEX_FILE);
      this.claimed.add(index);

      this.entry("folder", folder, depth, node);
      this.entry("index", index, depth + 1, node);

      if (!this.options.dryRun) {
        try {
          await this.directory(folder);
        } catch (error) {
          this.fail(node, `Failed to create directory: ${errorMessage(error)}`);
          return;
        }

        if (!(await this.write(node, index, content))) return;
      } else {
        this.stats.foldersCreated++;
        this.stats.filesCreated++;
      }

      this.stats.pagesExported++;

      for (const child of node.children) {
        await this.node(child, folder, depth + 1);
      }
      return;
    }

    const file = await this.unique(parent, layout.name(node, this.options.namingStrategy), ".md");
    this.entry("file", file, depth, node);

    if (!this.options.dryRun) {
      if (!(await this.write(node, file, content))) return;
    } else {
      this.stats.filesCreated++;
    }

    this.stats.pagesExported++;
  }

  private async content(node: PageNode): Promise<string> {
    let body: string;

    if (node.isDatabase) {
      body = renderDatabase(await this.source.queryDatabase(node.id), this.options.maxRows);
    } else {
      const converter = new BlockConverter({
        features: this.features,
        includeDatabases: this.options.includeDatabases,
        pageId: node.id
      });
      body = assemble(await this.source.getBlockChildren(node.id), converter);
    }

    return this.options.frontmatter ? frontmatter.render(node, this.options.exportDate) + body : body;
  }

  /**
   * First free `<name><ext>`, `<name>_1<ext>`, ... in `parent`. Files are checked
   * against the destination; folders only against this run.
   */
  private async unique(parent: string, name: string, ext: string): Promise<string> {
    const taken = async (candidate: string) =>
      this.claimed.has(candidate) || (ext !== "" && (await exists(candidate)));

    let candidate = path.join(parent, `${name}${ext}`);
    for (let counter = 1; await taken(candidate); counter++) {
      candidate = path.join(parent, `${name}_${counter}${ext}`);
    }

    this.claimed.add(candidate);
    return candidate;
  }

  private async directory(dir: string): Promise<void> {
    const created = await fs.mkdir(dir, { recursive: true });
    if (created !== undefined) {
      this.stats.foldersCreated++;
    }
  }

  private async write(node: PageNode, file: string, content: string): Promise<boolean> {
    try {
      await fs.writeFile(file, content, "utf-8");
      this.stats.filesCreated++;
      log.debug(`wrote ${file}`);
      return true;
    } catch (error) {
      this.fail(node, `Failed to write ${path.basename(file)}: ${errorMessage(error)}`);
      return false;
    }
  }

  private entry(kind: PlannedEntryKind, file: string, depth: number, node: PageNode) {
    this.plan.push({ kind, path: path.relative(this.options.output, file), depth, pageId: node.id });
  }

  private fail(node: PageNode, message: string) {
    log.error(`${node.title}: ${message}`, { id: node.id });
    this.stats.addError(node.id, message);
  }
}
