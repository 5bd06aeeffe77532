import { describe, expect, test } from "vitest";
import {
  mergeSubstituteFlags,
  NO_SUBSTITUTE_FLAGS,
  parseSubstituteArgument,
  parseSubstituteFlagsAndCount,
} from "./vim-substitute";

describe("parseSubstituteArgument", () => {
  test("pattern, replacement and flags", () => {
    const result = parseSubstituteArgument("/cat/dog/gi 3");
    expect(result).toEqual({
      succeeded: true,
      value: {
        pattern: "cat",
        replacement: "dog",
        flags: { ...NO_SUBSTITUTE_FLAGS, replaceAll: true, ignoreCase: true },
        keepFlags: false,
        count: 3,
      },
    });
  });

  test("an empty pattern is kept as empty", () => {
    const result = parseSubstituteArgument("//dog/");
    expect(result.succeeded && result.value.pattern).toBe("");
    expect(result.succeeded && result.value.replacement).toBe("dog");
    expect(result.succeeded && result.value.flags).toBeUndefined();
  });

  test("trailing delimiters may be left off", () => {
    const result = parseSubstituteArgument("#a#b");
    expect(result.succeeded && result.value.replacement).toBe("b");
    const patternOnly = parseSubstituteArgument("/a");
    expect(patternOnly.succeeded && patternOnly.value.pattern).toBe("a");
    expect(patternOnly.succeeded && patternOnly.value.replacement).toBe("");
  });

  test("an escaped delimiter is part of the text", () => {
    const result = parseSubstituteArgument("/a\\/b/c\\/d/");
    expect(result.succeeded && result.value.pattern).toBe("a/b");
    expect(result.succeeded && result.value.replacement).toBe("c/d");
  });

  test("other escapes are kept for the pattern translator", () => {
    const result = parseSubstituteArgument("/\\(a\\)\\\\/x/");
    expect(result.succeeded && result.value.pattern).toBe("\\(a\\)\\\\");
  });

  test("letters cannot delimit", () => {
    expect(parseSubstituteArgument("xaxbx")).toEqual({
      succeeded: false,
      error: "E146: Regular expressions can't be delimited by letters",
    });
  });
});

describe("parseSubstituteFlagsAndCount", () => {
  test("leading & keeps previous flags", () => {
    expect(parseSubstituteFlagsAndCount("&g")).toEqual({
      succeeded: true,
      value: {
        flags: { ...NO_SUBSTITUTE_FLAGS, replaceAll: true },
        keepFlags: true,
        count: undefined,
      },
    });
  });

  test("g given twice cancels out", () => {
    const result = parseSubstituteFlagsAndCount("gg");
    expect(result.succeeded && result.value.flags?.replaceAll).toBe(false);
  });

  test("count must be a positive number", () => {
    expect(parseSubstituteFlagsAndCount("g 0")).toEqual({
      succeeded: false,
      error: "E939: Positive count required",
    });
    expect(parseSubstituteFlagsAndCount("g x")).toEqual({
      succeeded: false,
      error: "E488: Trailing characters: x",
    });
  });
});

describe("mergeSubstituteFlags", () => {
  test("g toggles and I overrides a kept i", () => {
    const merged = mergeSubstituteFlags(
      { ...NO_SUBSTITUTE_FLAGS, replaceAll: true, ignoreCase: true },
      { ...NO_SUBSTITUTE_FLAGS, replaceAll: true, matchCase: true }
    );
    expect(merged.replaceAll).toBe(false);
    expect(merged.ignoreCase).toBe(false);
    expect(merged.matchCase).toBe(true);
  });
});
