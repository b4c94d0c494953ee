import { promises as fs, readFileSync } from "fs";
import path from "path";
import type { UnsupportedFeature } from "$lib/markdown/features";

export const REPORT_FILE = "export_report.md";

const BLOCKS_PER_PAGE = 5;
const UNKNOWN_PAGE = "Unknown Page";

const recommendations = (): string => readFileSync(path.join(__dirname, "recommendations.md"), "utf-8").trimEnd();

const group = <T>(items: readonly T[], key: (item: T) => string): Map<string, T[]> => {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const k = key(item);
    const existing = groups.get(k);
    if (existing) {
      existing.push(item);
    } else {
      groups.set(k, [item]);
    }
  }
  return groups;
};

/**
 * Markdown report of the fidelity-loss events of one export.
 */
export class ExportReport {
  /**
   * @param features - Records in discovery order.
   * @param titles - Page titles by page id, for grouping the breakdown.
   */
  constructor(
    private readonly features: readonly UnsupportedFeature[],
    private readonly titles: ReadonlyMap<string, string> = new Map()
  ) {}

  render(): string {
    if (this.features.length === 0) {
      return [
        "# Export Report",
        "",
        "All pages were exported successfully!",
        "",
        "No unsupported features were encountered during the export process.",
        ""
      ].join("\n");
    }

    const byType = group(this.features, (f) => `${f.blockType}.${f.feature}`);
    const keys = [...byType.keys()].sort();

    const lines = [
      "# Unsupported Features Report",
      "",
      "This report lists Notion features that could not be fully exported to Markdown.",
      "",
      `**Total unsupported features:** ${this.features.length}`,
      "",
      "---",
      "",
      "## Summary by Feature Type",
      ""
    ];

    for (const key of keys) {
      lines.push(`- **${key}**: ${byType.get(key)?.length ?? 0} occurrence(s)`);
    }

    lines.push("", "---", "", "## Detailed Breakdown", "");

    for (const key of keys) {
      const features = byType.get(key) ?? [];
      lines.push(`### ${key}`, "", `**Occurrences:** ${features.length}`, "");

      for (const [page, records] of group(features, (f) => this.page(f))) {
        lines.push(`**${page}:**`);
        for (const record of records.slice(0, BLOCKS_PER_PAGE)) {
          lines.push(`- Block ID: \`${record.blockId}\``);
        }
        if (records.length > BLOCKS_PER_PAGE) {
          lines.push(`- ... and ${records.length - BLOCKS_PER_PAGE} more`);
        }
        lines.push("");
      }
    }

    lines.push("---", "", "## Recommendations", "", recommendations(), "");

    return lines.join("\n");
  }

  /**
   * Write the report into `directory` and return its path.
   */
  async save(directory: string): Promise<string> {
    const file = path.join(directory, REPORT_FILE);
    await fs.writeFile(file, this.render(), "utf-8");
    return file;
  }

  private page(feature: UnsupportedFeature): string {
    if (!feature.pageId) return UNKNOWN_PAGE;
    return this.titles.get(feature.pageId) ?? feature.pageId;
  }
}
