/**
 * Content model the Markdown conversion works on.
 *
 * @remarks
 * Notion's API returns loosely shaped block and rich text records. They are
 * narrowed once (see `$notion/transformers`) into the closed unions below so
 * that every converter switch is checked for exhaustiveness by the compiler.
 */

/**
 * Style flags of one inline span. Flags combine freely.
 */
export interface SpanStyle {
  bold: boolean;
  italic: boolean;
  strikethrough: boolean;
  code: boolean;
}

export type MentionKind = "user" | "page" | "database" | "date" | "other";

interface SpanBase {
  /**
   * Text of the span with no markup applied.
   */
  plain: string;
  /**
   * Link target set on the span itself.
   */
  href: string | null;
  style: SpanStyle;
}

export interface TextSpan extends SpanBase {
  kind: "text";
  text: string;
  /**
   * Link carried by the text node, used when `href` is absent.
   */
  link: string | null;
}

export interface MentionSpan extends SpanBase {
  kind: "mention";
  mention: MentionKind;
  text: string;
}

export interface EquationSpan extends SpanBase {
  kind: "equation";
  expression: string;
}

export type Span = TextSpan | MentionSpan | EquationSpan;

export type RichText = readonly Span[];

/**
 * Where a media block's content lives: an external URL or a file hosted by Notion.
 */
export interface MediaSource {
  external: string | null;
  hosted: string | null;
}

interface BlockBase {
  id: string;
}

export type HeadingType = "heading_1" | "heading_2" | "heading_3";

export type TextBlockType = "paragraph" | "bulleted_list_item" | "numbered_list_item" | "toggle" | "quote";

export interface TextBlock extends BlockBase {
  type: TextBlockType;
  richText: RichText;
}

export interface HeadingBlock extends BlockBase {
  type: HeadingType;
  richText: RichText;
}

export interface ToDoBlock extends BlockBase {
  type: "to_do";
  richText: RichText;
  checked: boolean;
}

export interface CodeBlock extends BlockBase {
  type: "code";
  richText: RichText;
  language: string;
}

export interface CalloutBlock extends BlockBase {
  type: "callout";
  richText: RichText;
  /**
   * Emoji icon, when the callout has one.
   */
  icon: string | null;
}

export interface DividerBlock extends BlockBase {
  type: "divider";
}

export interface ChildPageBlock extends BlockBase {
  type: "child_page";
  title: string;
}

export interface ChildDatabaseBlock extends BlockBase {
  type: "child_database";
  title: string;
}

export interface TableBlock extends BlockBase {
  type: "table";
  hasColumnHeader: boolean;
  /**
   * Carried from the API but not used when rendering.
   */
  hasRowHeader: boolean;
}

export interface TableRowBlock extends BlockBase {
  type: "table_row";
  cells: readonly RichText[];
}

export interface ImageBlock extends BlockBase {
  type: "image";
  source: MediaSource;
  caption: RichText;
}

export interface FileBlock extends BlockBase {
  type: "file";
  source: MediaSource;
  caption: RichText;
  name: string;
}

export interface BookmarkBlock extends BlockBase {
  type: "bookmark";
  url: string;
  caption: RichText;
}

export interface EquationBlock extends BlockBase {
  type: "equation";
  expression: string;
}

/**
 * Any block type the converter has no rule for. `originalType` keeps the API's tag.
 */
export interface UnsupportedBlock extends BlockBase {
  type: "unsupported";
  originalType: string;
}

export type Block =
  | TextBlock
  | HeadingBlock
  | ToDoBlock
  | CodeBlock
  | CalloutBlock
  | DividerBlock
  | ChildPageBlock
  | ChildDatabaseBlock
  | TableBlock
  | TableRowBlock
  | ImageBlock
  | FileBlock
  | BookmarkBlock
  | EquationBlock
  | UnsupportedBlock;

export type BlockType = Block["type"];

/**
 * Output of converting one block.
 */
export interface Fragment {
  markdown: string;
  supported: boolean;
}

export type ListKind = "numbered";

/**
 * Position within the current run of list items, per list kind. Threaded by the caller.
 */
export type ListCounters = Partial<Record<ListKind, number>>;
