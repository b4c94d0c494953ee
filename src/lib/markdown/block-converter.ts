import { FeatureLog } from "./features";
import { richText } from "./rich-text";
import { tables } from "./tables";
import { Block, Fragment, HeadingType, ListCounters, MediaSource, TableBlock, TableRowBlock } from "./types";

const headingLevel: Record<HeadingType, number> = {
  heading_1: 1,
  heading_2: 2,
  heading_3: 3
};

export interface BlockConverterOptions {
  /**
   * Receives every fidelity-loss event found while converting.
   */
  features: FeatureLog;
  /**
   * When databases are exported on their own, a child database is not a loss.
   */
  includeDatabases?: boolean;
  /**
   * Page the converted blocks belong to, copied onto feature records.
   */
  pageId?: string;
}

const supported = (markdown: string): Fragment => ({ markdown, supported: true });

const url = (source: MediaSource): string => source.external || source.hosted || "";

/**
 * Converts single blocks to Markdown fragments.
 *
 * Never throws: missing data renders as empty text or a bracketed placeholder.
 */
export class BlockConverter {
  constructor(private readonly options: BlockConverterOptions) {}

  /**
   * Convert one block. `counters` carries numbered-list positions between sibling calls.
   */
  convert(block: Block, counters: ListCounters = {}): Fragment {
    switch (block.type) {
      case "paragraph":
        return supported(richText.render(block.richText));

      case "heading_1":
      case "heading_2":
      case "heading_3":
        return supported(`${"#".repeat(headingLevel[block.type])} ${richText.render(block.richText)}`);

      case "bulleted_list_item":
        return supported(`- ${richText.render(block.richText)}`);

      case "numbered_list_item": {
        const position = (counters.numbered ?? 0) + 1;
        counters.numbered = position;
        return supported(`${position}. ${richText.render(block.richText)}`);
      }

      case "to_do":
        return supported(`- ${block.checked ? "[x]" : "[ ]"} ${richText.render(block.richText)}`);

      // No collapsible construct in Markdown; the summary is kept in bold.
      case "toggle":
        return supported(`**${richText.render(block.richText)}**`);

      case "code":
        return supported(`\`\`\`${block.language}\n${richText.plain(block.richText)}\n\`\`\``);

      case "quote":
        return supported(`> ${richText.render(block.richText)}`);

      case "callout":
        return supported([">", block.icon ?? "", richText.render(block.richText)].filter(Boolean).join(" "));

      case "divider":
        return supported("---");

      case "equation":
        return supported(`$$\n${block.expression}\n$$`);

      case "image": {
        const caption = block.caption.length > 0 ? richText.render(block.caption) : "image";
        const target = url(block.source);
        if (target) {
          return supported(`![${caption}](${target})`);
        }
        this.unsupported(block.type, "no_url", block.id);
        return { markdown: `[Image: ${caption}]`, supported: false };
      }

      case "file": {
        const caption = block.caption.length > 0 ? richText.render(block.caption) : block.name || "file";
        const target = url(block.source);
        if (target) {
          return supported(`[${caption}](${target})`);
        }
        this.unsupported(block.type, "no_url", block.id);
        return { markdown: `[File: ${caption}]`, supported: false };
      }

      case "bookmark": {
        if (block.url) {
          const caption = block.caption.length > 0 ? richText.render(block.caption) : block.url;
          return supported(`[${caption}](${block.url})`);
        }
        this.unsupported(block.type, "no_url", block.id);
        return { markdown: "[Bookmark]", supported: false };
      }

      // Child pages become their own documents and rows belong to their table.
      case "child_page":
      case "table_row":
        return supported("");

      case "child_database":
        if (!this.options.includeDatabases) {
          this.unsupported(block.type, "not_exported", block.id);
        }
        return supported("");

      // Rendered together with its rows, see `table()`.
      case "table":
        return supported("");

      case "unsupported":
        if (block.originalType === "unsupported") {
          this.unsupported("unsupported", "unknown", block.id);
          return { markdown: "[Unsupported block]", supported: false };
        }
        this.unsupported(block.originalType, "unknown_type", block.id);
        return { markdown: `[Unsupported: ${block.originalType}]`, supported: false };

      default: {
        const unreachable: never = block;
        return unreachable;
      }
    }
  }

  /**
   * Render a table block together with the row blocks that follow it.
   */
  table(table: TableBlock, rows: readonly TableRowBlock[]): string {
    return tables.render({
      rows: rows.map((row) => row.cells.map((cell) => richText.render(cell))),
      hasColumnHeader: table.hasColumnHeader
    });
  }

  private unsupported(blockType: string, feature: string, blockId: string): void {
    this.options.features.record({ blockType, feature, blockId, pageId: this.options.pageId });
  }
}
