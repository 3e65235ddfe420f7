// Tests for incremental JSON value scanning

import { describe, it, expect } from "vitest";
import { JsonScanner, scanJsonValue } from "./json-scan.ts";

const bytes = (text: string) => new TextEncoder().encode(text);

describe("scanJsonValue", () => {
  it("scans one object and reports where it ends", () => {
    expect(scanJsonValue(bytes('{"a":1}{"b":2}'))).toEqual({
      kind: "value",
      value: { a: 1 },
      next: 7,
    });
  });

  it("starts at the given offset", () => {
    expect(scanJsonValue(bytes('{"a":1}{"b":2}'), 7)).toEqual({
      kind: "value",
      value: { b: 2 },
      next: 14,
    });
  });

  it("includes leading whitespace in the consumed range", () => {
    expect(scanJsonValue(bytes('\n  {"a":1}\n'))).toEqual({
      kind: "value",
      value: { a: 1 },
      next: 10,
    });
  });

  it("reports an empty or blank buffer as incomplete", () => {
    expect(scanJsonValue(new Uint8Array(0))).toEqual({ kind: "incomplete" });
    expect(scanJsonValue(bytes(" \r\n\t"))).toEqual({ kind: "incomplete" });
  });

  it("reports a truncated object as incomplete", () => {
    expect(scanJsonValue(bytes('{"a":'))).toEqual({ kind: "incomplete" });
    expect(scanJsonValue(bytes('{"a":{"b":[1,2]}'))).toEqual({ kind: "incomplete" });
  });

  it("ignores brackets and escaped quotes inside strings", () => {
    const text = '{"s":"}]\\"{["}';
    expect(scanJsonValue(bytes(text + "{}"))).toEqual({
      kind: "value",
      value: { s: '}]"{[' },
      next: text.length,
    });
  });

  it("reports a string cut inside an escape as incomplete", () => {
    expect(scanJsonValue(bytes('{"s":"a\\'))).toEqual({ kind: "incomplete" });
  });

  it("scans nested arrays", () => {
    expect(scanJsonValue(bytes("[[1],[2,[3]]]"))).toEqual({
      kind: "value",
      value: [[1], [2, [3]]],
      next: 13,
    });
  });

  it("scans top-level strings", () => {
    expect(scanJsonValue(bytes('"hi" '))).toEqual({ kind: "value", value: "hi", next: 4 });
  });

  it("treats a number at the end of the buffer as incomplete", () => {
    expect(scanJsonValue(bytes("12"))).toEqual({ kind: "incomplete" });
    expect(scanJsonValue(bytes("12\n"))).toEqual({ kind: "value", value: 12, next: 2 });
  });

  it("completes a number at the end of the buffer when no more input follows", () => {
    expect(scanJsonValue(bytes("12"), 0, true)).toEqual({ kind: "value", value: 12, next: 2 });
    expect(scanJsonValue(bytes("{}false"), 2, true)).toEqual({
      kind: "value",
      value: false,
      next: 7,
    });
  });

  it("scans literals followed by a delimiter", () => {
    expect(scanJsonValue(bytes("true{}"))).toEqual({ kind: "value", value: true, next: 4 });
    expect(scanJsonValue(bytes("null "))).toEqual({ kind: "value", value: null, next: 4 });
  });

  it("handles multi-byte characters split across the buffer end", () => {
    const full = bytes('{"name":"日本"}');
    expect(scanJsonValue(full.subarray(0, 11))).toEqual({ kind: "incomplete" });
    expect(scanJsonValue(full)).toEqual({
      kind: "value",
      value: { name: "日本" },
      next: full.length,
    });
  });

  it("reports bytes that cannot start a value as invalid", () => {
    expect(scanJsonValue(bytes(' }{"a":1}'))).toEqual({
      kind: "invalid",
      offset: 1,
      reason: "unexpected byte 0x7d",
    });
  });

  it("reports a complete but malformed value as invalid", () => {
    const scan = scanJsonValue(bytes("{a:1}"));
    expect(scan.kind).toBe("invalid");
    if (scan.kind === "invalid") {
      expect(scan.offset).toBe(0);
    }
  });

  it("reports a misspelled literal as invalid", () => {
    expect(scanJsonValue(bytes("tru ")).kind).toBe("invalid");
  });

  it("reports malformed UTF-8 as invalid", () => {
    expect(scanJsonValue(Uint8Array.from([0x22, 0xff, 0x22]))).toEqual({
      kind: "invalid",
      offset: 0,
      reason: "malformed UTF-8",
    });
  });
});

describe("JsonScanner", () => {
  it("resumes where the previous scan stopped", () => {
    const whole = bytes(' {"a":[1,"]}"],"b":{"c":"\\\\"}}');
    const scanner = new JsonScanner();

    for (let end = 0; end < whole.length; end++) {
      expect(scanner.scan(whole.subarray(0, end))).toEqual({ kind: "incomplete" });
    }
    expect(scanner.scan(whole)).toEqual({
      kind: "value",
      value: { a: [1, "]}"], b: { c: "\\" } },
      next: whole.length,
    });
  });

  it("starts over after a value", () => {
    const scanner = new JsonScanner();
    const first = bytes('[1]"x"');

    expect(scanner.scan(first)).toEqual({ kind: "value", value: [1], next: 3 });
    expect(scanner.scan(first.subarray(3))).toEqual({ kind: "value", value: "x", next: 3 });
  });

  it("waits for the end of input to complete a trailing literal", () => {
    const scanner = new JsonScanner();
    const buf = bytes("nu");

    expect(scanner.scan(buf)).toEqual({ kind: "incomplete" });
    const more = bytes("null");
    expect(scanner.scan(more)).toEqual({ kind: "incomplete" });
    expect(scanner.scan(more, true)).toEqual({ kind: "value", value: null, next: 4 });
  });
});
