// src/utils/test/validators.spec.ts
import { HttpError } from "../errors";
import { parseNumber, parseQueryString } from "../validators";

describe("parseQueryString", () => {
  test("passes single values through", () => {
    expect(parseQueryString("Norway", "country")).toBe("Norway");
    expect(parseQueryString("", "country")).toBe("");
    expect(parseQueryString(undefined, "country")).toBeUndefined();
  });

  test("rejects repeated params with a 400", () => {
    expect(() => parseQueryString(["a", "b"], "country")).toThrow(HttpError);
    expect(() => parseQueryString(["a", "b"], "country")).toThrow("Query parameter 'country' must be given once");
  });
});

describe("parseNumber", () => {
  test("finite numbers only", () => {
    expect(parseNumber("25")).toBe(25);
    expect(parseNumber("abc")).toBeUndefined();
    expect(parseNumber(undefined)).toBeUndefined();
  });
});
