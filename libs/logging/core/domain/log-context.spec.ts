import { ContextRequest } from "./context-request";
import { LogContext } from "./log-context";
import { LogRecord } from "./log-record";

class TenantContext extends LogContext {
  constructor() {
    super("tenant", "none");
  }

  extractFromRequest(request: ContextRequest): string {
    return request.header("x-tenant") || "none";
  }
}

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("LogContext", () => {
  let context: TenantContext;

  beforeEach(() => {
    context = new TenantContext();
  });

  it("should return the default value outside of any scope", () => {
    expect(context.get()).toBe("none");
  });

  it("should start every scope from the default value", () => {
    const seen = context.runInScope(() => context.get());

    expect(seen).toBe("none");
  });

  it("should keep a value set in a scope across awaits", async () => {
    const seen = await context.runInScope(async () => {
      context.set("acme");
      await sleep(1);
      return context.get();
    });

    expect(seen).toBe("acme");
  });

  it("should isolate concurrent scopes", async () => {
    const run = (tenant: string, delay: number) =>
      context.runInScope(async () => {
        context.set(tenant);
        await sleep(delay);
        return context.get();
      });

    await expect(Promise.all([run("a", 15), run("b", 1)])).resolves.toEqual([
      "a",
      "b",
    ]);
  });

  it("should restore the default value on reset", () => {
    const seen = context.runInScope(() => {
      context.set("acme");
      context.reset();
      return context.get();
    });

    expect(seen).toBe("none");
  });

  it("should not share slots between context instances", () => {
    const other = new TenantContext();

    const seen = context.runInScope(() =>
      other.runInScope(() => {
        context.set("acme");
        return other.get();
      }),
    );

    expect(seen).toBe("none");
  });

  describe("createFilter", () => {
    it("should stamp the current value on the record and accept it", () => {
      const filter = context.createFilter();
      const record: LogRecord = { message: "hello" };

      const accepted = context.runInScope(() => {
        context.set("acme");
        return filter.filter(record);
      });

      expect(accepted).toBe(true);
      expect(record).toEqual({ message: "hello", tenant: "acme" });
    });

    it("should stamp the default value outside of any scope", () => {
      const record: LogRecord = {};

      context.createFilter().filter(record);

      expect(record.tenant).toBe("none");
    });
  });

  it("should expose a stable filter factory bound to the instance", () => {
    expect(context.filterFactory).toBe(context.filterFactory);

    const record: LogRecord = {};
    context.filterFactory().filter(record);
    expect(record).toEqual({ tenant: "none" });
  });
});
