import { ConfigMapping } from "./config-mapping.util";
import { deepMerge } from "./deep-merge.util";

describe("deepMerge", () => {
  it("should return base itself when override is missing or empty", () => {
    const base = { a: 1 };

    expect(deepMerge(base)).toBe(base);
    expect(deepMerge(base, null)).toBe(base);
    expect(deepMerge(base, {})).toBe(base);
  });

  it("should merge nested mappings recursively", () => {
    const base = { handlers: { console: { level: "info", formatter: "standard" } } };
    const override = { handlers: { console: { level: "debug" } } };

    expect(deepMerge(base, override)).toEqual({
      handlers: { console: { level: "debug", formatter: "standard" } },
    });
  });

  it("should replace lists instead of concatenating them", () => {
    const base = { root: { handlers: ["console"] } };
    const override = { root: { handlers: ["file"] } };

    expect(deepMerge(base, override)).toEqual({ root: { handlers: ["file"] } });
  });

  it("should let a scalar replace a mapping and the other way round", () => {
    expect(deepMerge({ a: { b: 1 } }, { a: 2 })).toEqual({ a: 2 });
    expect(deepMerge({ a: 2 }, { a: { b: 1 } })).toEqual({ a: { b: 1 } });
  });

  it("should keep keys present only in base and add keys only in override", () => {
    expect(deepMerge({ a: 1, b: 2 }, { c: 3 })).toEqual({ a: 1, b: 2, c: 3 });
  });

  it("should not mutate either input", () => {
    const base = { loggers: { nest: { level: "info" } } };
    const override = { loggers: { nest: { level: "debug" }, app: { level: "warn" } } };

    deepMerge(base, override);

    expect(base).toEqual({ loggers: { nest: { level: "info" } } });
    expect(override).toEqual({
      loggers: { nest: { level: "debug" }, app: { level: "warn" } },
    });
  });

  it("should let a null override value replace the base value", () => {
    expect(deepMerge({ a: { b: 1 } }, { a: null })).toEqual({ a: null });
  });

  it("should keep a __proto__ key as a plain entry", () => {
    const override: ConfigMapping = JSON.parse('{"__proto__": {"level": "debug"}}');

    const result = deepMerge({ root: { handlers: ["console"] } }, override);

    expect(Object.keys(result)).toEqual(["root", "__proto__"]);
    expect(Object.getPrototypeOf(result)).toBe(Object.prototype);
    expect(Object.getOwnPropertyDescriptor(result, "__proto__")?.value).toEqual({
      level: "debug",
    });
  });
});
