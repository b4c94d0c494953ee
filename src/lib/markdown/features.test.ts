import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { log } from "$lib/log";
import { describeFeature, FeatureLog } from "./features";

describe("FeatureLog", () => {
  let level: log.Level;

  beforeEach(() => {
    level = log.getLevel();
  });

  afterEach(() => {
    log.setLevel(level);
    vi.restoreAllMocks();
  });

  it("should describe a record by block type, feature and block", () => {
    expect(describeFeature({ blockType: "file", feature: "no_url", blockId: "b-1" })).toBe(
      "Unsupported: file.no_url (block: b-1)"
    );
  });

  it("should keep records in order and log each one at debug level", () => {
    const output = vi.spyOn(console, "log").mockImplementation(() => undefined);
    log.setLevel("debug");

    const features = new FeatureLog();
    features.record({ blockType: "child_database", feature: "not_exported", blockId: "d-1", pageId: "p-1" });
    features.record({ blockType: "synced_block", feature: "unknown_type", blockId: "s-1" });

    expect(features.size).toBe(2);
    expect(features.records.map((f) => f.blockId)).toEqual(["d-1", "s-1"]);
    expect(output.mock.calls[0][0]).toContain("Unsupported: child_database.not_exported (block: d-1)");
    expect(output.mock.calls[2][0]).toContain("Unsupported: synced_block.unknown_type (block: s-1)");
  });
});
