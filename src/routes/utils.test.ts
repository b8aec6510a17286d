import type { Request } from "express";
import { getPathParam, getQueryList, getQueryParam, parseIntParam, strToBool } from "./utils";

function req(query: Record<string, unknown>, params: Record<string, unknown> = {}): Request {
  return { query, params } as unknown as Request;
}

describe("route utils", () => {
  test("strToBool", () => {
    expect(strToBool("TRUE", false)).toBe(true);
    expect(strToBool(" off ", true)).toBe(false);
    expect(strToBool("unknown", true)).toBe(true);
    expect(strToBool(undefined, false)).toBe(false);
  });

  test("getQueryParam takes the first value", () => {
    expect(getQueryParam(req({ tail: "50" }), "tail")).toBe("50");
    expect(getQueryParam(req({ tail: ["10", "20"] }), "tail")).toBe("10");
    expect(getQueryParam(req({}), "tail")).toBeUndefined();
  });

  test("getQueryList merges repeated and comma separated values", () => {
    expect(getQueryList(req({ names: "web,db" }), "names")).toEqual(["web", "db"]);
    expect(getQueryList(req({ names: ["web", "cache, web"] }), "names")).toEqual(["web", "cache"]);
    expect(getQueryList(req({ names: " , " }), "names")).toBeUndefined();
    expect(getQueryList(req({}), "names")).toBeUndefined();
  });

  test("parseIntParam", () => {
    expect(parseIntParam("42")).toBe(42);
    expect(parseIntParam("-5")).toBe(-5);
    expect(parseIntParam("")).toBeNull();
    expect(parseIntParam(undefined)).toBeNull();
    expect(parseIntParam("4.5")).toBeNaN();
    expect(parseIntParam("abc")).toBeNaN();
  });

  test("getPathParam", () => {
    expect(getPathParam(req({}, { name: "web" }), "name")).toBe("web");
    expect(getPathParam(req({}, { name: ["a", "b"] }), "name")).toBe("a/b");
    expect(getPathParam(req({}, {}), "name")).toBe("");
  });
});
