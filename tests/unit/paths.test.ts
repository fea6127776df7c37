import { describe, it, expect } from "vitest";
import {
  splitPath,
  joinPath,
  joinNames,
  sanitizeName,
  validatePath,
  PathError,
} from "../../src/paths.js";

describe("splitPath", () => {
  it("returns no segments for empty input", () => {
    expect(splitPath("")).toEqual([]);
  });

  it("returns no segments for root", () => {
    expect(splitPath("/")).toEqual([]);
  });

  it("treats leading, trailing and repeated separators alike", () => {
    expect(splitPath("/a//b/")).toEqual(["a", "b"]);
    expect(splitPath("a/b")).toEqual(["a", "b"]);
    expect(splitPath("/a/b")).toEqual(["a", "b"]);
  });

  it("splits on backslashes too", () => {
    expect(splitPath("a\\b/c")).toEqual(["a", "b", "c"]);
  });

  it("keeps dot segments as names", () => {
    expect(splitPath("a/../b")).toEqual(["a", "..", "b"]);
  });
});

describe("joinPath", () => {
  it("skips empty parts", () => {
    expect(joinPath("", "a", "", "b")).toBe("a/b");
  });

  it("returns empty string for no parts", () => {
    expect(joinPath()).toBe("");
  });

  it("flattens parts that already contain separators", () => {
    expect(joinPath("a/b", "c")).toBe("a/b/c");
  });
});

describe("joinNames", () => {
  it("sanitizes every segment", () => {
    expect(joinNames(["it's", "a", "b'c"])).toBe("it-s/a/b-c");
  });

  it("returns empty string for no segments", () => {
    expect(joinNames([])).toBe("");
  });
});

describe("sanitizeName", () => {
  it("leaves ordinary names alone", () => {
    expect(sanitizeName("File 1.txt")).toBe("File 1.txt");
  });

  it("replaces separators and quotes with dashes", () => {
    expect(sanitizeName("a/b\\c'd")).toBe("a-b-c-d");
  });
});

describe("validatePath", () => {
  it("returns segments for valid input", () => {
    expect(validatePath("/Folder1/File1")).toEqual(["Folder1", "File1"]);
  });

  it("returns no segments for the root", () => {
    expect(validatePath("")).toEqual([]);
  });

  it("throws on null bytes", () => {
    expect(() => validatePath("/a\0b")).toThrow(PathError);
  });

  it("throws on control characters", () => {
    expect(() => validatePath("/a\x01b")).toThrow(PathError);
  });

  it("throws on excessively long paths", () => {
    const long = "/" + "a".repeat(4096);
    expect(() => validatePath(long)).toThrow(PathError);
  });

  it("accepts paths at the length limit", () => {
    const p = "/" + "a".repeat(4095);
    expect(validatePath(p)).toEqual(["a".repeat(4095)]);
  });
});
