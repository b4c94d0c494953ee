import { promises as fs } from "fs";
import path from "path";
import { stringify } from "yaml";
import { log } from "$lib/log";
import type { PageNode } from "$lib/hierarchy/page-node";
import { errorMessage } from "$shared/errors";
import { normalization } from "$util/normalization";
import { REPORT_FILE } from "../report/report";
import { layout } from "./layout";

export namespace frontmatter {
  export const SOURCE = "Exported from Notion";

  export const has = (content: string): boolean => content.startsWith("---\n");

  /**
   * YAML front matter block for a page, followed by a blank line.
   */
  export const render = (node: PageNode, exportDate: Date = new Date()): string => {
    const fields = {
      title: node.title,
      source: SOURCE,
      export_date: exportDate.toISOString().slice(0, 10),
      notion_id: node.id,
      created: node.createdTime ?? "unknown",
      last_edited: node.lastEditedTime ?? "unknown"
    };

    return `---\n${stringify(fields)}---\n\n`;
  };

  export const prepend = (content: string, node: PageNode, exportDate?: Date): string =>
    has(content) ? content : render(node, exportDate) + content;
}

export interface FrontmatterOptions {
  dryRun?: boolean;
  namingStrategy?: normalization.strategy;
  exportDate?: Date;
}

export interface FrontmatterResult {
  found: number;
  updated: number;
  /**
   * Files that already started with front matter.
   */
  skipped: number;
  /**
   * Files no discovered page maps to.
   */
  unmatched: string[];
  failed: [file: string, message: string][];
}

const markdownFiles = async (directory: string): Promise<string[]> => {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const full = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await markdownFiles(full)));
    } else if (entry.isFile() && entry.name.endsWith(".md") && entry.name !== REPORT_FILE) {
      files.push(full);
    }
  }

  return files.sort();
};

/**
 * Add front matter to the files of an earlier export.
 *
 * Files are matched to pages by the path the exporter gives each page.
 * Collision suffixes are not reproduced, so `Notes_1.md` stays unmatched.
 */
export const applyFrontmatter = async (
  forest: readonly PageNode[],
  directory: string,
  options: FrontmatterOptions = {}
): Promise<FrontmatterResult> => {
  const mapping = layout.map(forest, directory, options.namingStrategy);
  const files = await markdownFiles(directory);
  const result: FrontmatterResult = { found: files.length, updated: 0, skipped: 0, unmatched: [], failed: [] };

  for (const file of files) {
    const node = mapping.get(file);
    if (!node) {
      result.unmatched.push(path.relative(directory, file));
      continue;
    }

    try {
      const content = await fs.readFile(file, "utf-8");
      if (frontmatter.has(content)) {
        log.debug(`already has front matter: ${file}`);
        result.skipped++;
        continue;
      }

      if (!options.dryRun) {
        await fs.writeFile(file, frontmatter.render(node, options.exportDate) + content, "utf-8");
      }
      log.debug(`${options.dryRun ? "would add" : "added"} front matter: ${file}`);
      result.updated++;
    } catch (error) {
      log.error(`Failed to update ${file}`, { error: errorMessage(error) });
      result.failed.push([file, errorMessage(error)]);
    }
  }

  return result;
};
