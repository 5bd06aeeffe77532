import { describe, expect, test } from "vitest";
import { createTextBuffer } from "./vim-buffer";

describe("createTextBuffer", () => {
  test("text content is split on newlines", () => {
    const buffer = createTextBuffer("one\ntwo\n");
    expect(buffer.getLines()).toEqual(["one", "two"]);
    expect(buffer.getText()).toBe("one\ntwo");
  });

  test("an empty buffer still has one line", () => {
    expect(createTextBuffer([]).getLines()).toEqual([""]);
    const buffer = createTextBuffer(["a", "b"]);
    buffer.deleteLines(0, 2);
    expect(buffer.getLines()).toEqual([""]);
  });

  test("marks follow inserted and deleted lines", () => {
    const buffer = createTextBuffer(["a", "b", "c"], { marks: { a: 2, b: 1 } });
    buffer.insertLines(1, ["new"]);
    expect(buffer.getMark("a")).toBe(3);
    expect(buffer.getMark("b")).toBe(2);
    buffer.deleteLines(0, 1);
    expect(buffer.getMark("a")).toBe(2);
    buffer.deleteLines(1, 1);
    expect(buffer.getMark("b")).toBeUndefined();
    expect(buffer.getMark("a")).toBe(1);
  });

  test("the cursor is kept inside the buffer", () => {
    const buffer = createTextBuffer(["a", "b", "c"], { cursorLine: 9 });
    expect(buffer.getCursorLine()).toBe(2);
    buffer.deleteLines(1, 2);
    expect(buffer.getCursorLine()).toBe(0);
    buffer.setCursorLine(-3);
    expect(buffer.getCursorLine()).toBe(0);
  });

  test("lines outside the buffer throw", () => {
    const buffer = createTextBuffer(["a"]);
    expect(() => buffer.getLine(1)).toThrow(RangeError);
    expect(() => buffer.insertLines(3, ["x"])).toThrow(RangeError);
    expect(() => buffer.setMark("m", -1)).toThrow(RangeError);
  });

  test("the file path is reported", () => {
    expect(createTextBuffer("x", { filePath: "notes.txt" }).getFilePath()).toBe(
      "notes.txt"
    );
    expect(createTextBuffer("x").getFilePath()).toBeUndefined();
  });
});
