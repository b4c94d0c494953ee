import { tables } from "./tables";

/**
 * A database flattened to text: one column per property, one row per entry.
 */
export interface DatabaseTable {
  id: string;
  title: string;
  columns: readonly string[];
  rows: readonly (readonly string[])[];
}

/**
 * Render a database as a Markdown document: its title as a heading followed
 * by a table of its entries. `maxRows` caps the entries and notes the cut.
 */
export const renderDatabase = (database: DatabaseTable, maxRows?: number): string => {
  const body = databaseTable(database, maxRows);
  return `# ${database.title}\n\n${body}\n`;
};

export const databaseTable = (database: DatabaseTable, maxRows?: number): string => {
  if (database.columns.length === 0) {
    return "_Empty database_";
  }

  const rows = maxRows ? database.rows.slice(0, maxRows) : database.rows;
  const lines = [
    tables.line(database.columns),
    tables.separator(database.columns.length),
    ...rows.map((row) => tables.line(database.columns.map((_, i) => tables.escape(row[i] ?? ""))))
  ];

  if (maxRows && database.rows.length > maxRows) {
    lines.push("", `_Table truncated to ${maxRows} rows_`);
  }

  return lines.join("\n");
};
