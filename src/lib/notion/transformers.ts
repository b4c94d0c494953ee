import type {
  BlockObjectResponse,
  DatabaseObjectResponse,
  PageObjectResponse,
  PartialBlockObjectResponse,
  RichTextItemResponse
} from "@notionhq/client/build/src/api-endpoints";
import { isFullBlock } from "@notionhq/client";
import type { DatabaseTable } from "$lib/markdown/database";
import type { Block, MediaSource, MentionKind, RichText, Span, SpanStyle } from "$lib/markdown/types";
import { NotionObjectMetadata, NotionObjectType, NotionParentType } from "./types";

export const UNTITLED = "Untitled";

type PropertyValue = PageObjectResponse["properties"][string];

const plainText = (items: readonly RichTextItemResponse[]): string =>
  items
    .map((item) => item.plain_text)
    .join("")
    .trim();

/**
 * Extract the title of a page from its title property.
 */
export const title = (page: PageObjectResponse): string => {
  for (const property of Object.values(page.properties)) {
    if (property.type === "title") {
      return plainText(property.title) || UNTITLED;
    }
  }
  return UNTITLED;
};

const parent = (value: PageObjectResponse["parent"] | DatabaseObjectResponse["parent"]): NotionParentType => {
  switch (value.type) {
    case "workspace":
      return "workspace";
    case "page_id":
      return "page";
    case "database_id":
      return "database";
    default:
      return "block";
  }
};

const mentionKinds: readonly MentionKind[] = ["user", "page", "database", "date"];

const mention = (type: string): MentionKind => mentionKinds.find((kind) => kind === type) ?? "other";

/**
 * Location of an image or file block's content.
 */
const media = (content: object): MediaSource => {
  const external =
    "external" in content && typeof content.external === "object" && content.external !== null && "url" in content.external
      ? String(content.external.url)
      : null;
  const hosted =
    "file" in content && typeof content.file === "object" && content.file !== null && "url" in content.file
      ? String(content.file.url)
      : null;

  return { external, hosted };
};

export namespace transformers {
  export const style = (item: RichTextItemResponse): SpanStyle => ({
    bold: item.annotations.bold,
    italic: item.annotations.italic,
    strikethrough: item.annotations.strikethrough,
    code: item.annotations.code
  });

  export const span = (item: RichTextItemResponse): Span => {
    const common = { plain: item.plain_text, href: item.href, style: style(item) };

    switch (item.type) {
      case "text":
        return { ...common, kind: "text", text: item.text.content, link: item.text.link?.url ?? null };
      case "mention":
        return { ...common, kind: "mention", mention: mention(item.mention.type), text: item.plain_text };
      case "equation":
        return { ...common, kind: "equation", expression: item.equation.expression };
    }
  };

  export const richText = (items: readonly RichTextItemResponse[] | undefined): RichText => (items ?? []).map(span);

  /**
   * Narrow an API block into the closed block union.
   *
   * Partial blocks and types without a conversion rule become `unsupported`.
   */
  export const block = (value: BlockObjectResponse | PartialBlockObjectResponse): Block => {
    if (!isFullBlock(value)) {
      return { id: value.id, type: "unsupported", originalType: "unsupported" };
    }

    const id = value.id;

    switch (value.type) {
      case "paragraph":
        return { id, type: value.type, richText: richText(value.paragraph.rich_text) };
      case "heading_1":
        return { id, type: value.type, richText: richText(value.heading_1.rich_text) };
      case "heading_2":
        return { id, type: value.type, richText: richText(value.heading_2.rich_text) };
      case "heading_3":
        return { id, type: value.type, richText: richText(value.heading_3.rich_text) };
      case "bulleted_list_item":
        return { id, type: value.type, richText: richText(value.bulleted_list_item.rich_text) };
      case "numbered_list_item":
        return { id, type: value.type, richText: richText(value.numbered_list_item.rich_text) };
      case "toggle":
        return { id, type: value.type, richText: richText(value.toggle.rich_text) };
      case "quote":
        return { id, type: value.type, richText: richText(value.quote.rich_text) };
      case "to_do":
        return { id, type: value.type, richText: richText(value.to_do.rich_text), checked: value.to_do.checked };
      case "code":
        return { id, type: value.type, richText: richText(value.code.rich_text), language: value.code.language };
      case "callout": {
        const icon = value.callout.icon;
        return {
          id,
          type: value.type,
          richText: richText(value.callout.rich_text),
          icon: icon !== null && icon.type === "emoji" ? icon.emoji : null
        };
      }
      case "divider":
        return { id, type: value.type };
      case "child_page":
        return { id, type: value.type, title: value.child_page.title };
      case "child_database":
        return { id, type: value.type, title: value.child_database.title };
      case "table":
        return {
          id,
          type: value.type,
          hasColumnHeader: value.table.has_column_header,
          hasRowHeader: value.table.has_row_header
        };
      case "table_row":
        return { id, type: value.type, cells: value.table_row.cells.map((cell) => richText(cell)) };
      case "image":
        return { id, type: value.type, source: media(value.image), caption: richText(value.image.caption) };
      case "file": {
        const content = value.file;
        const name = "name" in content && typeof content.name === "string" ? content.name : "";
        return { id, type: value.type, source: media(content), caption: richText(content.caption), name };
      }
      case "bookmark":
        return { id, type: value.type, url: value.bookmark.url, caption: richText(value.bookmark.caption) };
      case "equation":
        return { id, type: value.type, expression: value.equation.expression };
      default:
        return { id, type: "unsupported", originalType: value.type };
    }
  };

  export const page = (value: PageObjectResponse): NotionObjectMetadata => ({
    id: value.id,
    title: title(value),
    objectType: NotionObjectType.PAGE,
    parentType: parent(value.parent),
    createdTime: value.created_time,
    lastEditedTime: value.last_edited_time
  });

  export const database = (value: DatabaseObjectResponse): NotionObjectMetadata => ({
    id: value.id,
    title: plainText(value.title) || UNTITLED,
    objectType: NotionObjectType.DATABASE,
    parentType: parent(value.parent),
    createdTime: value.created_time,
    lastEditedTime: value.last_edited_time
  });

  const dateRange = (date: { start: string; end: string | null } | null): string => {
    if (!date) return "";
    return date.end ? `${date.start} → ${date.end}` : date.start;
  };

  const userName = (user: object): string => ("name" in user && typeof user.name === "string" ? user.name : "");

  /**
   * Plain text value of a database entry's property.
   */
  export const property = (value: PropertyValue): string => {
    const type: string = value.type;

    switch (value.type) {
      case "title":
        return plainText(value.title);
      case "rich_text":
        return plainText(value.rich_text);
      case "number":
        return value.number === null ? "" : String(value.number);
      case "select":
        return value.select?.name ?? "";
      case "status":
        return value.status?.name ?? "";
      case "multi_select":
        return value.multi_select.map((option) => option.name).join(", ");
      case "date":
        return dateRange(value.date);
      case "people":
        return value.people
          .map(userName)
          .filter((name) => name.length > 0)
          .join(", ");
      case "checkbox":
        return value.checkbox ? "✓" : "";
      case "url":
        return value.url ?? "";
      case "email":
        return value.email ?? "";
      case "phone_number":
        return value.phone_number ?? "";
      case "formula": {
        const formula = value.formula;
        switch (formula.type) {
          case "string":
            return formula.string ?? "";
          case "number":
            return formula.number === null ? "" : String(formula.number);
          case "boolean":
            return formula.boolean ? "Yes" : "No";
          case "date":
            return formula.date?.start ?? "";
          default:
            return "";
        }
      }
      case "relation":
        return `${value.relation.length} item(s)`;
      case "rollup": {
        const rollup = value.rollup;
        switch (rollup.type) {
          case "number":
            return rollup.number === null ? "" : String(rollup.number);
          case "array":
            return `${rollup.array.length} item(s)`;
          default:
            return "";
        }
      }
      case "created_time":
        return value.created_time;
      case "last_edited_time":
        return value.last_edited_time;
      case "created_by":
        return userName(value.created_by);
      case "last_edited_by":
        return userName(value.last_edited_by);
      case "files":
        return value.files.map((file) => file.name).join(", ");
      default:
        return `[${type}]`;
    }
  };

  /**
   * Flatten a database and its entries into text cells, columns in schema order.
   */
  export const table = (database: DatabaseObjectResponse, entries: readonly PageObjectResponse[]): DatabaseTable => {
    const columns = Object.keys(database.properties);

    return {
      id: database.id,
      title: plainText(database.title) || UNTITLED,
      columns,
      rows: entries.map((entry) => columns.map((column) => (column in entry.properties ? property(entry.properties[column]) : "")))
    };
  };
}
