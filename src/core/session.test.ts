import { describe, it, expect } from "vitest";
import { appendHistory } from "./session.js";

describe("appendHistory", () => {
  it("keeps the most recent queries", () => {
    expect(appendHistory(["a", "b", "c"], " d ", 3)).toEqual(["b", "c", "d"]);
    expect(appendHistory([], "first", 3)).toEqual(["first"]);
  });
});
