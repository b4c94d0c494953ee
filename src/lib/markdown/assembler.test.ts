import { describe, expect, it } from "vitest";
import { bulleted, childPage, heading, numbered, paragraph, row, table } from "$test/blocks";
import { assemble } from "./assembler";
import { BlockConverter } from "./block-converter";
import { FeatureLog } from "./features";

const converter = () => new BlockConverter({ features: new FeatureLog() });

describe("assemble", () => {
  it("should join fragments with a blank line and drop empty ones", () => {
    const blocks = [heading("h", "Title"), childPage("c", "Sub"), paragraph("p", "Body")];

    expect(assemble(blocks, converter())).toBe("# Title\n\nBody");
  });

  it("should render nothing for an empty page", () => {
    expect(assemble([], converter())).toBe("");
  });

  it("should number consecutive items and restart after an interruption", () => {
    const blocks = [
      numbered("1", "one"),
      numbered("2", "two"),
      numbered("3", "three"),
      bulleted("b", "aside"),
      numbered("4", "again")
    ];

    expect(assemble(blocks, converter())).toBe("1. one\n\n2. two\n\n3. three\n\n- aside\n\n1. again");
  });

  it("should consume exactly the rows that follow a table", () => {
    const blocks = [
      table("t", true),
      row("r1", "Name", "Qty"),
      row("r2", "Apples", "3"),
      paragraph("p", "After"),
      row("stray", "not", "grouped")
    ];

    expect(assemble(blocks, converter())).toBe("| Name | Qty |\n|---|---|\n| Apples | 3 |\n\nAfter");
  });

  it("should restart numbering after a table", () => {
    const blocks = [numbered("1", "first"), table("t", false), row("r", "x"), numbered("2", "second")];

    expect(assemble(blocks, converter())).toBe("1. first\n\n| Column 1 |\n|---|\n| x |\n\n1. second");
  });

  it("should drop a table without rows", () => {
    expect(assemble([table("t"), paragraph("p", "text")], converter())).toBe("text");
  });
});
