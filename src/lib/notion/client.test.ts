import { APIErrorCode } from "@notionhq/client";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { NotionApiError, RateLimitError } from "$shared/errors";
import { NotionClient } from "./client";
import { NotionObjectType } from "./types";

const sdk = vi.hoisted(() => ({
  search: vi.fn(),
  pages: { retrieve: vi.fn() },
  databases: { retrieve: vi.fn(), query: vi.fn() },
  blocks: { children: { list: vi.fn() } }
}));

vi.mock("@notionhq/client", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@notionhq/client")>();
  return {
    ...actual,
    Client: vi.fn(function () {
      return sdk;
    })
  };
});

const text = (content: string) => ({
  type: "text",
  text: { content, link: null },
  annotations: { bold: false, italic: false, strikethrough: false, underline: false, code: false, color: "default" },
  plain_text: content,
  href: null
});

const page = (id: string, title: string, parent: object = { type: "workspace", workspace: true }) => ({
  object: "page",
  id,
  url: `https://www.notion.so/${id}`,
  parent,
  created_time: "2024-01-01T00:00:00.000Z",
  last_edited_time: "2024-01-02T00:00:00.000Z",
  properties: { Name: { id: "title", type: "title", title: [text(title)] } }
});

const block = (id: string, type: string, content: object, hasChildren = false) => ({
  object: "block",
  id,
  type,
  has_children: hasChildren,
  [type]: content
});

const list = (results: unknown[]) => ({ object: "list", results, next_cursor: null, has_more: false });

describe("NotionClient", () => {
  let client: NotionClient;

  beforeEach(() => {
    vi.clearAllMocks();
    client = new NotionClient({ apiKey: "secret_testtoken0000000000", retries: 1, retryDelay: 1 });
  });

  it("should map a retrieved page to metadata", async () => {
    sdk.pages.retrieve.mockResolvedValue(page("p1", "Projects"));

    await expect(client.getPage("p1")).resolves.toEqual({
      id: "p1",
      title: "Projects",
      objectType: NotionObjectType.PAGE,
      parentType: "workspace",
      createdTime: "2024-01-01T00:00:00.000Z",
      lastEditedTime: "2024-01-02T00:00:00.000Z"
    });
  });

  it("should fall back to Untitled for an empty title", async () => {
    sdk.pages.retrieve.mockResolvedValue(page("p1", "   "));

    const result = await client.getPage("p1");

    expect(result.title).toBe("Untitled");
  });

  it("should search pages with the page filter and keep only full pages", async () => {
    sdk.search.mockResolvedValue(list([page("p1", "A"), { object: "page", id: "partial" }]));

    const results = await client.searchPages();

    expect(results.map((r) => r.id)).toEqual(["p1"]);
    expect(sdk.search).toHaveBeenCalledWith({
      filter: { property: "object", value: "page" },
      start_cursor: undefined,
      page_size: 100
    });
  });

  it("should place table rows directly after their table", async () => {
    sdk.blocks.children.list.mockImplementation(async ({ block_id }: { block_id: string }) => {
      if (block_id === "t1") {
        return list([
          block("r1", "table_row", { cells: [[text("a")], [text("b")]] }),
          block("r2", "table_row", { cells: [[text("c")], [text("d")]] })
        ]);
      }
      return list([
        block("b1", "paragraph", { rich_text: [text("Hello")] }),
        block("t1", "table", { table_width: 2, has_column_header: true, has_row_header: false }, true),
        block("b2", "divider", {})
      ]);
    });

    const blocks = await client.getBlockChildren("p1");

    expect(blocks.map((b) => `${b.id}:${b.type}`)).toEqual([
      "b1:paragraph",
      "t1:table",
      "r1:table_row",
      "r2:table_row",
      "b2:divider"
    ]);
  });

  it("should turn unknown block types into unsupported blocks", async () => {
    sdk.blocks.children.list.mockResolvedValue(list([block("x1", "synced_block", {})]));

    const [result] = await client.getBlockChildren("p1");

    expect(result).toEqual({ id: "x1", type: "unsupported", originalType: "synced_block" });
  });

  it("should flatten a database into a table", async () => {
    sdk.databases.retrieve.mockResolvedValue({
      object: "database",
      id: "d1",
      title: [text("Tasks")],
      parent: { type: "page_id", page_id: "p1" },
      created_time: "2024-01-01T00:00:00.000Z",
      last_edited_time: "2024-01-01T00:00:00.000Z",
      properties: { Name: { id: "title", type: "title" }, Done: { id: "d", type: "checkbox" } }
    });
    sdk.databases.query.mockResolvedValue(
      list([
        {
          ...page("e1", "Write docs"),
          properties: {
            Name: { id: "title", type: "title", title: [text("Write docs")] },
            Done: { id: "d", type: "checkbox", checkbox: true }
          }
        }
      ])
    );

    await expect(client.queryDatabase("d1")).resolves.toEqual({
      id: "d1",
      title: "Tasks",
      columns: ["Name", "Done"],
      rows: [["Write docs", "✓"]]
    });
  });

  it("should transform API errors into domain errors", async () => {
    sdk.pages.retrieve.mockRejectedValue({ code: APIErrorCode.ObjectNotFound, message: "missing" });

    const error = await client.getPage("nope").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NotionApiError);
    expect(error).toMatchObject({ notionErrorCode: "object_not_found" });
    expect(sdk.pages.retrieve).toHaveBeenCalledTimes(1);
  });

  it("should retry rate limits and then report a rate limit error", async () => {
    sdk.pages.retrieve.mockRejectedValue({ code: APIErrorCode.RateLimited });

    await expect(client.getPage("p1")).rejects.toBeInstanceOf(RateLimitError);
    expect(sdk.pages.retrieve).toHaveBeenCalledTimes(2);
  });
});
