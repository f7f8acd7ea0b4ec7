import { MISSING_FIELD, renderTemplate } from "./format-template.util";

describe("renderTemplate", () => {
  it("should substitute every placeholder with the record field", () => {
    expect(
      renderTemplate("[%(levelname)s][request_id: %(request_id)s]: %(message)s", {
        levelname: "INFO",
        request_id: "r-1",
        message: "hello",
      }),
    ).toBe("[INFO][request_id: r-1]: hello");
  });

  it("should render missing and null fields as a dash", () => {
    expect(MISSING_FIELD).toBe("-");
    expect(renderTemplate("%(a)s|%(b)s", { b: null })).toBe("-|-");
  });

  it("should render numbers, errors and objects", () => {
    expect(
      renderTemplate("%(n)s %(e)s %(o)s", {
        n: 42,
        e: new Error("broken"),
        o: { status: 200 },
      }),
    ).toBe('42 broken {"status":200}');
  });

  it("should leave text outside placeholders untouched", () => {
    expect(renderTemplate("100% done (%(step)s)", { step: "x" })).toBe(
      "100% done (x)",
    );
  });
});
