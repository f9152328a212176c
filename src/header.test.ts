import { describe, it, expect } from "vitest";
import { formatArrayHeader, parseArrayHeader, splitDelimited } from "./header.js";

describe("parseArrayHeader", () => {
  it("parses an inline primitive array", () => {
    expect(parseArrayHeader("items[3]: a,b,c", ",")).toEqual({
      key: "items",
      length: 3,
      delimiter: ",",
      fields: undefined,
      hasLengthMarker: false,
      inlineValue: "a,b,c",
    });
  });

  it("parses a tabular header", () => {
    const header = parseArrayHeader("users[2]{id,name}:", ",");
    expect(header?.key).toBe("users");
    expect(header?.fields).toEqual(["id", "name"]);
    expect(header?.inlineValue).toBeUndefined();
  });

  it("parses a key-less header with a delimiter suffix", () => {
    const header = parseArrayHeader("[2|]: a|b", ",");
    expect(header?.key).toBeUndefined();
    expect(header?.delimiter).toBe("|");
    expect(header?.inlineValue).toBe("a|b");
  });

  it("uses the suffix delimiter for the field list", () => {
    const header = parseArrayHeader("rows[2\t]{a\tb}:", ",");
    expect(header?.delimiter).toBe("\t");
    expect(header?.fields).toEqual(["a", "b"]);
  });

  it("falls back to the default delimiter", () => {
    expect(parseArrayHeader("tags[2]{a|b}:", "|")?.fields).toEqual(["a", "b"]);
  });

  it("recognizes the length marker", () => {
    const header = parseArrayHeader("tags[#2]: x,y", ",");
    expect(header?.hasLengthMarker).toBe(true);
    expect(header?.length).toBe(2);
  });

  it("unescapes quoted keys and field names", () => {
    expect(parseArrayHeader('"my key"[1]: x', ",")?.key).toBe("my key");
    expect(parseArrayHeader('t[1]{"first name",age}:', ",")?.fields).toEqual(["first name", "age"]);
  });

  it("reads an empty field list", () => {
    const header = parseArrayHeader("[0]{}:", ",");
    expect(header?.length).toBe(0);
    expect(header?.fields).toEqual([]);
  });

  it("returns undefined for lines that are not headers", () => {
    expect(parseArrayHeader("name: Ada", ",")).toBeUndefined();
    expect(parseArrayHeader("note: see [1]", ",")).toBeUndefined();
    expect(parseArrayHeader("a[x]: 1", ",")).toBeUndefined();
    expect(parseArrayHeader("a[2]", ",")).toBeUndefined();
    expect(parseArrayHeader("a[2]{x}", ",")).toBeUndefined();
    expect(parseArrayHeader('"key": [1]', ",")).toBeUndefined();
  });
});

describe("splitDelimited", () => {
  it("splits outside quotes and trims", () => {
    expect(splitDelimited('a, "b,c" ,d', ",")).toEqual(["a", '"b,c"', "d"]);
  });

  it("keeps escaped quotes inside a quoted piece", () => {
    expect(splitDelimited('"x\\",y",z', ",")).toEqual(['"x\\",y"', "z"]);
  });

  it("keeps empty pieces", () => {
    expect(splitDelimited("a,,b,", ",")).toEqual(["a", "", "b", ""]);
  });

  it("returns nothing for empty input", () => {
    expect(splitDelimited("", ",")).toEqual([]);
  });
});

describe("formatArrayHeader", () => {
  it("writes keyed headers", () => {
    expect(formatArrayHeader(3, { key: "items", delimiter: ",", lengthMarker: false })).toBe("items[3]:");
    expect(formatArrayHeader(1, { key: "my key", delimiter: ",", lengthMarker: false })).toBe('"my key"[1]:');
  });

  it("writes field lists with the active delimiter", () => {
    expect(
      formatArrayHeader(2, { key: "users", fields: ["id", "name"], delimiter: "|", lengthMarker: true }),
    ).toBe("users[#2]{id|name}:");
  });

  it("writes key-less empty headers", () => {
    expect(formatArrayHeader(0, { fields: [], delimiter: ",", lengthMarker: false })).toBe("[0]{}:");
  });
});
