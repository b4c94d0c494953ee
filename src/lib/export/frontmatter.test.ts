import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { parse } from "yaml";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PageNode } from "$lib/hierarchy/page-node";
import { log } from "$lib/log";
import { normalization } from "$util/normalization";
import { applyFrontmatter, frontmatter } from "./frontmatter";
import { layout } from "./layout";

const exportDate = new Date("2025-01-15T12:00:00Z");

const page = (id: string, title: string) =>
  new PageNode(id, title, null, false, "2024-03-01T10:00:00.000Z", "2024-03-02T10:00:00.000Z");

describe("frontmatter", () => {
  it("should render the page fields as YAML", () => {
    const block = frontmatter.render(page("abc", 'Say "hi": now'), exportDate);

    expect(block.startsWith("---\n")).toBe(true);
    expect(block.endsWith("---\n\n")).toBe(true);
    expect(parse(block.slice(4, -5))).toEqual({
      title: 'Say "hi": now',
      source: "Exported from Notion",
      export_date: "2025-01-15",
      notion_id: "abc",
      created: "2024-03-01T10:00:00.000Z",
      last_edited: "2024-03-02T10:00:00.000Z"
    });
  });

  it("should use unknown for missing timestamps", () => {
    const block = frontmatter.render(new PageNode("x", "X"), exportDate);

    expect(parse(block.slice(4, -5))).toMatchObject({ created: "unknown", last_edited: "unknown" });
  });

  it("should leave content that already has front matter", () => {
    const content = "---\ntitle: Old\n---\n\nBody";

    expect(frontmatter.has(content)).toBe(true);
    expect(frontmatter.prepend(content, page("a", "A"), exportDate)).toBe(content);
  });
});

describe("layout", () => {
  it("should map folders to index files and leaves to files", () => {
    const root = page("r", "Root");
    root.children.push(page("c", "Child"));

    const mapping = layout.map([root, page("s", "Solo: one")], "/out");

    expect([...mapping.entries()].map(([file, node]) => `${file}=${node.id}`)).toEqual([
      `${path.join("/out", "Root", "index.md")}=r`,
      `${path.join("/out", "Root", "Child.md")}=c`,
      `${path.join("/out", "Solo_ one.md")}=s`
    ]);
  });

  it("should follow the naming strategy", () => {
    expect(layout.document(page("s", "Solo One"), "/out", normalization.strategy.SLUG)).toBe(
      path.join("/out", "solo-one.md")
    );
  });
});

describe("applyFrontmatter", () => {
  let dir: string;

  beforeEach(async () => {
    log.setLevel("silent");
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "notion-md-frontmatter-"));
    await fs.mkdir(path.join(dir, "Root"));
    await fs.writeFile(path.join(dir, "Root", "index.md"), "Root body");
    await fs.writeFile(path.join(dir, "Root", "Child.md"), "---\ntitle: Child\n---\n\nChild body");
    await fs.writeFile(path.join(dir, "Stray.md"), "no page");
    await fs.writeFile(path.join(dir, "export_report.md"), "# Export Report");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
    log.setLevel("info");
  });

  const forest = () => {
    const root = page("r", "Root");
    root.children.push(page("c", "Child"));
    return [root];
  };

  it("should add front matter to matching files only", async () => {
    const result = await applyFrontmatter(forest(), dir, { exportDate });

    expect(result).toEqual({ found: 3, updated: 1, skipped: 1, unmatched: ["Stray.md"], failed: [] });

    const index = await fs.readFile(path.join(dir, "Root", "index.md"), "utf-8");
    expect(index.startsWith("---\ntitle: Root\n")).toBe(true);
    expect(index.endsWith("---\n\nRoot body")).toBe(true);
    await expect(fs.readFile(path.join(dir, "export_report.md"), "utf-8")).resolves.toBe("# Export Report");
  });

  it("should not write in dry run", async () => {
    const result = await applyFrontmatter(forest(), dir, { dryRun: true });

    expect(result.updated).toBe(1);
    await expect(fs.readFile(path.join(dir, "Root", "index.md"), "utf-8")).resolves.toBe("Root body");
  });
});
