import { describe, it, expect } from "vitest";
import { decode } from "./decoder.js";
import { ToonDecodeError, ToonOptionsError } from "./errors.js";
import type { DecodeOptions } from "./options.js";
import { arr, bool, double, emptyObject, int, isObject, nil, obj, str, type ToonValue } from "./value.js";

function decodeError(text: string, options?: DecodeOptions): ToonDecodeError {
  try {
    decode(text, options);
  } catch (e) {
    if (e instanceof ToonDecodeError) return e;
    throw e;
  }
  throw new Error("expected decode to fail");
}

function keysOf(value: ToonValue): string[] {
  return isObject(value) ? [...value.fields.keys()] : [];
}

describe("decode", () => {
  describe("root dispatch", () => {
    it("decodes a single primitive", () => {
      expect(decode("42.5")).toEqual(double(42.5));
      expect(decode("true")).toEqual(bool(true));
      expect(decode("null")).toEqual(nil());
      expect(decode("hello world")).toEqual(str("hello world"));
    });

    it("decodes a quoted primitive containing a colon", () => {
      expect(decode('"a: b"')).toEqual(str("a: b"));
    });

    it("decodes a one-line object", () => {
      expect(decode("a: 1")).toEqual(obj({ a: int(1) }));
    });

    it("decodes a root array", () => {
      expect(decode("[3]: 1,2,3")).toEqual(arr([int(1), int(2), int(3)]));
      expect(decode("[0]{}:")).toEqual(arr());
    });
  });

  describe("objects", () => {
    it("decodes nested objects in order", () => {
      const value = decode("name: Alice\nage: 30\naddress:\n  city: Paris\n  zip: \"75001\"");
      expect(value).toEqual(
        obj({ name: str("Alice"), age: int(30), address: obj({ city: str("Paris"), zip: str("75001") }) }),
      );
      expect(keysOf(value)).toEqual(["name", "age", "address"]);
    });

    it("decodes an empty nested object", () => {
      expect(decode("a:\nb: 1")).toEqual(obj({ a: emptyObject(), b: int(1) }));
    });

    it("lets a repeated key overwrite in place", () => {
      const value = decode("a: 1\nb: 2\na: 3");
      expect(keysOf(value)).toEqual(["a", "b"]);
      expect(value).toEqual(obj({ a: int(3), b: int(2) }));
    });

    it("reads quoted keys and values with colons", () => {
      expect(decode('"full name": Ada\nurl: "http://x"\ntime: 12:30')).toEqual(
        obj({ "full name": str("Ada"), url: str("http://x"), time: str("12:30") }),
      );
    });

    it("skips blank lines", () => {
      expect(decode("a: 1\n\n   \nb: 2\n")).toEqual(obj({ a: int(1), b: int(2) }));
    });
  });

  describe("arrays", () => {
    it("decodes inline primitive arrays", () => {
      expect(decode("tags[2]: red,blue")).toEqual(obj({ tags: arr([str("red"), str("blue")]) }));
      expect(decode("empty[0]{}:")).toEqual(obj({ empty: arr() }));
    });

    it("decodes tabular arrays", () => {
      expect(decode("users[2]{id,name}:\n  1,Ada\n  2,Bob")).toEqual(
        obj({
          users: arr([obj({ id: int(1), name: str("Ada") }), obj({ id: int(2), name: str("Bob") })]),
        }),
      );
    });

    it("decodes list items of every shape", () => {
      const text = ["items[4]:", "  - 1", "  - name: x", "    n: 2", "  - [2]: a,b", "  -"].join("\n");
      expect(decode(text)).toEqual(
        obj({
          items: arr([
            int(1),
            obj({ name: str("x"), n: int(2) }),
            arr([str("a"), str("b")]),
            emptyObject(),
          ]),
        }),
      );
    });

    it("nests the first field of a list item two levels deeper", () => {
      const text = ["[1]:", "  - user:", "      id: 1", "    role: admin"].join("\n");
      expect(decode(text)).toEqual(arr([obj({ user: obj({ id: int(1) }), role: str("admin") })]));
    });

    it("decodes an object under a bare marker", () => {
      const text = ["[1]:", "  -", "    a: 1", "    b: 2"].join("\n");
      expect(decode(text)).toEqual(arr([obj({ a: int(1), b: int(2) })]));
    });

    it("treats a marker with trailing spaces as a bare marker", () => {
      expect(decode("[2]:\n  - \n  - x")).toEqual(arr([emptyObject(), str("x")]));
      expect(decode("[1]:\n  - \n    a: 1")).toEqual(arr([obj({ a: int(1) })]));
    });

    it("decodes nested list arrays", () => {
      const text = ["[1]:", "  - [1]:", "    - x: 1"].join("\n");
      expect(decode(text)).toEqual(arr([arr([obj({ x: int(1) })])]));
    });

    it("takes the delimiter from the header suffix", () => {
      expect(decode("[2|]: a,b|c")).toEqual(arr([str("a,b"), str("c")]));
    });

    it("takes the delimiter from the options", () => {
      expect(decode("tags[2]: red|blue", { delimiter: "pipe" })).toEqual(
        obj({ tags: arr([str("red"), str("blue")]) }),
      );
      expect(decode("t[1]{a\tb}:\n  1\tx", { delimiter: "tab" })).toEqual(
        obj({ t: arr([obj({ a: int(1), b: str("x") })]) }),
      );
    });

    it("accepts the length marker", () => {
      expect(decode("tags[#2]: a,b")).toEqual(obj({ tags: arr([str("a"), str("b")]) }));
    });
  });

  describe("strict mode", () => {
    it("enforces the declared length", () => {
      const error = decodeError("tags[3]: red,blue");
      expect(error.code).toBe("LENGTH_MISMATCH");
      expect(error.message).toBe('Line 1: Array "tags" declares 3 items, but 2 were found');
    });

    it("enforces list lengths", () => {
      expect(decodeError("[1]:\n  - a\n  - b").message).toBe("Line 1: Array declares 1 items, but 2 were found");
    });

    it("enforces row width", () => {
      const error = decodeError("t[1]{a,b}:\n  1");
      expect(error.code).toBe("ROW_WIDTH_MISMATCH");
      expect(error.line).toBe(2);
      expect(error.reason).toBe("Row has 1 values, but the header names 2 fields");
    });

    it("rejects tab indentation", () => {
      expect(decodeError("a:\n\tb: 1").code).toBe("TAB_INDENT");
    });

    it("rejects indentation off the indent grid", () => {
      expect(decodeError("a:\n   b: 1").code).toBe("INDENT_MULTIPLE");
    });
  });

  describe("lenient mode", () => {
    const lenient = { strict: false };

    it("lets the actual count win", () => {
      expect(decode("tags[3]: red,blue", lenient)).toEqual(obj({ tags: arr([str("red"), str("blue")]) }));
    });

    it("pads short rows with null and drops extra cells", () => {
      expect(decode("t[2]{a,b}:\n  1\n  1,2,3", lenient)).toEqual(
        obj({ t: arr([obj({ a: int(1), b: nil() }), obj({ a: int(1), b: int(2) })]) }),
      );
    });

    it("accepts tab indentation", () => {
      expect(decode("a:\n\tb: 1", { strict: false, indent: 4 })).toEqual(obj({ a: obj({ b: int(1) }) }));
    });
  });

  describe("errors", () => {
    it("rejects an empty document", () => {
      expect(decodeError("").message).toBe("Line 1: Empty document");
      expect(decodeError("\n  \n").code).toBe("EMPTY_DOCUMENT");
    });

    it("rejects an unterminated string", () => {
      expect(decodeError('name: "Ada').message).toBe("Line 1: Unterminated string: missing closing quote");
    });

    it("rejects a key without a colon", () => {
      const error = decodeError("a: 1\nb");
      expect(error.code).toBe("MISSING_COLON");
      expect(error.message).toBe("Line 2: Missing colon after key");
    });

    it("rejects unexpected indentation", () => {
      expect(decodeError("a: 1\n  b: 2").message).toBe(
        "Line 2: Unexpected indentation (expected depth 0, found 1)",
      );
    });

    it("rejects a non-item line inside a list", () => {
      const error = decodeError("items[1]:\n  x");
      expect(error.code).toBe("EXPECTED_LIST_ITEM");
      expect(error.line).toBe(2);
    });

    it("rejects content after a root array", () => {
      expect(decodeError("[1]: a\nb: 2").message).toBe("Line 2: Unexpected content after document root");
    });

    it("rejects a key-less header inside an object", () => {
      expect(decodeError("a: 1\n[2]: x,y").code).toBe("MISSING_KEY");
    });

    it("rejects inline values after a tabular header", () => {
      expect(decodeError("t[1]{a}: 1").code).toBe("UNEXPECTED_CONTENT");
    });

    it("rejects invalid options", () => {
      expect(() => decode("a: 1", { indent: 0 })).toThrow(ToonOptionsError);
      expect(() => decode("a: 1", { indent: 0 })).toThrow("Invalid decode options: indent");
    });
  });
});
