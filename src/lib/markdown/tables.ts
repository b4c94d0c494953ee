export namespace tables {
  export type Row = readonly string[];

  export const line = (cells: Row): string => `| ${cells.join(" | ")} |`;

  export const separator = (columns: number): string => `|${Array.from({ length: columns }, () => "---").join("|")}|`;

  export const escape = (value: string): string => value.replace(/\|/g, "\\|");

  /**
   * Pad every row with empty cells up to the widest row.
   */
  export const pad = (rows: readonly Row[]): string[][] => {
    const width = rows.reduce((max, row) => Math.max(max, row.length), 0);
    return rows.map((row) => [...row, ...Array.from({ length: width - row.length }, () => "")]);
  };

  /**
   * Render rows as a Markdown table.
   *
   * With `hasColumnHeader` the first row is the header; otherwise a generic
   * `Column 1`, `Column 2`, ... header is generated and every row is data.
   * No rows renders as the empty string.
   */
  export const render = ({ rows, hasColumnHeader }: { rows: readonly Row[]; hasColumnHeader: boolean }): string => {
    if (rows.length === 0) {
      return "";
    }

    const padded = pad(rows);
    const width = padded[0].length;
    const header = hasColumnHeader ? padded[0] : Array.from({ length: width }, (_, i) => `Column ${i + 1}`);
    const data = hasColumnHeader ? padded.slice(1) : padded;

    return [line(header), separator(width), ...data.map(line)].join("\n");
  };
}
