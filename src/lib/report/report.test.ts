import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { describe, expect, it } from "vitest";
import type { UnsupportedFeature } from "$lib/markdown/features";
import { ExportReport, REPORT_FILE } from "./report";

const feature = (blockType: string, feature: string, blockId: string, pageId?: string): UnsupportedFeature => ({
  blockType,
  feature,
  blockId,
  pageId
});

describe("ExportReport", () => {
  it("should render a success report without records", () => {
    const report = new ExportReport([]).render();

    expect(report.split("\n")[0]).toBe("# Export Report");
    expect(report).toContain("No unsupported features were encountered during the export process.");
  });

  it("should summarise by sorted feature key with counts", () => {
    const report = new ExportReport([
      feature("image", "no_url", "b1"),
      feature("child_database", "not_exported", "b2"),
      feature("image", "no_url", "b3")
    ]).render();
    const lines = report.split("\n");

    expect(lines).toContain("**Total unsupported features:** 3");
    const summary = lines.indexOf("## Summary by Feature Type");
    expect(lines.slice(summary + 2, summary + 4)).toEqual([
      "- **child_database.not_exported**: 1 occurrence(s)",
      "- **image.no_url**: 2 occurrence(s)"
    ]);
    expect(report).toContain("## Recommendations");
  });

  it("should group blocks by page title and cap the listing", () => {
    const records = Array.from({ length: 7 }, (_, i) => feature("image", "no_url", `b${i}`, "p1"));
    records.push(feature("image", "no_url", "other", undefined));

    const lines = new ExportReport(records, new Map([["p1", "Gallery"]])).render().split("\n");
    const start = lines.indexOf("**Gallery:**");

    expect(lines.slice(start, start + 8)).toEqual([
      "**Gallery:**",
      "- Block ID: `b0`",
      "- Block ID: `b1`",
      "- Block ID: `b2`",
      "- Block ID: `b3`",
      "- Block ID: `b4`",
      "- ... and 2 more",
      ""
    ]);
    expect(lines[lines.indexOf("**Unknown Page:**") + 1]).toBe("- Block ID: `other`");
  });

  it("should save the report into the directory", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "notion-md-report-"));
    try {
      const file = await new ExportReport([]).save(dir);

      expect(file).toBe(path.join(dir, REPORT_FILE));
      await expect(fs.readFile(file, "utf-8")).resolves.toContain("# Export Report");
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
