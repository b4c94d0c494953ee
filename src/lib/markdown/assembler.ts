import { BlockConverter } from "./block-converter";
import { Block, ListCounters, TableRowBlock } from "./types";

/**
 * Convert the ordered sibling blocks of one page into its document body.
 *
 * A table consumes the `table_row` blocks directly after it. Numbering of a
 * numbered list restarts after any other block, tables included. Fragments
 * are separated by a blank line and empty fragments are dropped.
 */
export const assemble = (blocks: readonly Block[], converter: BlockConverter): string => {
  const parts: string[] = [];
  const counters: ListCounters = {};

  let i = 0;
  while (i < blocks.length) {
    const block = blocks[i];

    if (block.type === "table") {
      const rows: TableRowBlock[] = [];
      let next = i + 1;
      for (; next < blocks.length; next++) {
        const candidate = blocks[next];
        if (candidate.type !== "table_row") break;
        rows.push(candidate);
      }

      const markdown = converter.table(block, rows);
      if (markdown) parts.push(markdown);

      delete counters.numbered;
      i = next;
      continue;
    }

    if (block.type !== "numbered_list_item") {
      delete counters.numbered;
    }

    const { markdown } = converter.convert(block, counters);
    if (markdown) parts.push(markdown);

    i++;
  }

  return parts.join("\n\n");
};
