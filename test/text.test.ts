import { describe, expect, it } from "vitest";

import { compareStrings } from "../src/core/text.js";

describe("compareStrings", () => {
  it("orders by code unit regardless of locale", () => {
    expect(["b", "B", "a", "_"].sort(compareStrings)).toEqual(["B", "_", "a", "b"]);
    expect(compareStrings("src/a.ts", "src/a.ts")).toBe(0);
  });
});
