import { describe, it, expect } from "vitest";
import { ToonError } from "./errors.js";
import { parseJson, stringifyJson } from "./json.js";
import { INT64_MAX, arr, bool, double, emptyObject, int, isObject, nil, obj, str, valueEquals } from "./value.js";

describe("parseJson", () => {
  it("converts JSON into the value model", () => {
    expect(parseJson('{"a":1,"b":[true,null,"x"],"c":1.5}')).toEqual(
      obj({ a: int(1), b: arr([bool(true), nil(), str("x")]), c: double(1.5) }),
    );
  });

  it("reads numbers by their source text", () => {
    expect(parseJson("-2")).toEqual(int(-2));
    expect(parseJson("30.0")).toEqual(double(30));
    expect(parseJson("1e2")).toEqual(double(100));
    expect(parseJson("9223372036854775807")).toEqual(int(INT64_MAX));
    expect(parseJson("9223372036854775808")).toEqual(double(9223372036854775808));
  });

  it("keeps member order, including integer-like keys", () => {
    const value = parseJson('{"b":1,"2":2,"a":3}');
    expect(isObject(value) ? [...value.fields.keys()] : []).toEqual(["b", "2", "a"]);
  });

  it("reports invalid JSON as a ToonError", () => {
    expect(() => parseJson("{bad")).toThrow(ToonError);
    expect(() => parseJson("{bad")).toThrow(/^Invalid JSON: /);
    expect(() => parseJson("")).toThrow(/^Invalid JSON: /);
    expect(() => parseJson('{"a":1 // note\n}')).toThrow(/^Invalid JSON: /);
  });

  it("names the line of the first error", () => {
    try {
      parseJson('{\n  "a": tru\n}');
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ToonError);
      if (e instanceof ToonError) expect(e.line).toBe(2);
    }
  });
});

describe("stringifyJson", () => {
  const value = obj({ a: int(1), b: arr([double(2), str('x"y')]), c: emptyObject(), d: arr() });

  it("indents nested values", () => {
    expect(stringifyJson(value)).toBe(
      ["{", '  "a": 1,', '  "b": [', "    2.0,", '    "x\\"y"', "  ],", '  "c": {},', '  "d": []', "}"].join("\n"),
    );
  });

  it("writes compact output with indent 0", () => {
    expect(stringifyJson(value, 0)).toBe('{"a":1,"b":[2.0,"x\\"y"],"c":{},"d":[]}');
  });

  it("keeps every digit of large ints", () => {
    expect(stringifyJson(int(INT64_MAX))).toBe("9223372036854775807");
  });

  it("writes primitives at the root", () => {
    expect(stringifyJson(str("hi"))).toBe('"hi"');
    expect(stringifyJson(nil())).toBe("null");
    expect(stringifyJson(bool(false))).toBe("false");
    expect(stringifyJson(double(Infinity))).toBe("null");
  });

  it("reads back doubles, big ints and key order unchanged", () => {
    const data = obj([
      ["b", double(30)],
      ["2", int(1)],
      ["big", int(9007199254740993n)],
      ["neg", double(-0)],
    ]);
    const text = stringifyJson(data, 0);
    expect(text).toBe('{"b":30.0,"2":1,"big":9007199254740993,"neg":-0.0}');
    expect(valueEquals(parseJson(text), data)).toBe(true);
  });

  it("produces JSON that parses back", () => {
    const data = obj({ name: str("Ada"), scores: arr([int(1), double(2.5)]), meta: obj({ ok: bool(true) }) });
    expect(parseJson(stringifyJson(data))).toEqual(data);
  });
});
