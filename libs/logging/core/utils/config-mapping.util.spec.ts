import {
  getEntry,
  getMapping,
  isMapping,
  setEntry,
  toStringList,
} from "./config-mapping.util";

describe("config mapping helpers", () => {
  it("should only treat plain objects as mappings", () => {
    expect(isMapping({})).toBe(true);
    expect(isMapping([])).toBe(false);
    expect(isMapping(null)).toBe(false);
    expect(isMapping("handlers")).toBe(false);
  });

  it("should read nested mappings and ignore other values", () => {
    const source = { handlers: { console: {} }, root: "console" };

    expect(getMapping(source, "handlers")).toEqual({ console: {} });
    expect(getMapping(source, "root")).toBeUndefined();
    expect(getMapping(undefined, "handlers")).toBeUndefined();
  });

  it("should coerce a single name to a list and drop non-strings", () => {
    expect(toStringList("console")).toEqual(["console"]);
    expect(toStringList(["a", 1, "b"])).toEqual(["a", "b"]);
    expect(toStringList(undefined)).toEqual([]);
  });
});

describe("own entries", () => {
  it("should ignore inherited entries when reading", () => {
    expect(getEntry({}, "__proto__")).toBeUndefined();
    expect(getEntry({ level: "info" }, "level")).toBe("info");
  });

  it("should define entries without touching the prototype", () => {
    const target = {};

    setEntry(target, "__proto__", { level: "debug" });

    expect(Object.getPrototypeOf(target)).toBe(Object.prototype);
    expect(Object.keys(target)).toEqual(["__proto__"]);
  });
});
