import { describe, expect, it } from "vitest";
import {
  joinSharePath,
  splitSharePath,
} from "../src/utils/file-share-client/paths.js";

describe("joinSharePath", () => {
  it("skips empty segments so the share root joins cleanly", () => {
    expect(joinSharePath("", "a.html")).toBe("a.html");
    expect(joinSharePath("reports/", "/a.html")).toBe("reports/a.html");
    expect(joinSharePath("incoming/reports", "a.html")).toBe(
      "incoming/reports/a.html",
    );
  });
});

describe("splitSharePath", () => {
  it("separates the directory from the file name", () => {
    expect(splitSharePath("processed/a.html")).toEqual({
      directory: "processed",
      fileName: "a.html",
    });
    expect(splitSharePath("a.html")).toEqual({ directory: "", fileName: "a.html" });
    expect(splitSharePath("/x/y/z.html")).toEqual({
      directory: "x/y",
      fileName: "z.html",
    });
  });
});
