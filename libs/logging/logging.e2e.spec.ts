import { Controller, Get, INestApplication, Param, Query, Res } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { Test } from "@nestjs/testing";
import { AsyncResource } from "async_hooks";
import { Response } from "express";
import { tmpdir } from "os";
import { join } from "path";
import { Writable } from "stream";
import { LogConfigurationUseCase } from "@logging/in-ports";
import { LogContextRegistry } from "@logging/service";
import { LoggingModule } from "./logging.module";

class MemoryStream extends Writable {
  readonly lines: string[] = [];

  override _write(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    this.lines.push(chunk.toString().trimEnd());
    callback();
  }
}

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));
const flush = () => new Promise((resolve) => setImmediate(resolve));

@Controller()
class OrdersController {
  readFailedSlot: () => unknown = () => undefined;

  constructor(private readonly registry: LogContextRegistry) {}

  @Get("orders/:id")
  async findOne(@Param("id") id: string, @Query("delay") delay: string) {
    const before = this.correlationId();
    await sleep(Number(delay));
    return { id, before, after: this.correlationId() };
  }

  @Get("raw")
  raw(@Res() res: Response): void {
    res.json({ ok: true });
  }

  @Get("fail")
  fail(): never {
    this.readFailedSlot = AsyncResource.bind(() => this.correlationId());
    throw new Error("boom");
  }

  private correlationId(): unknown {
    return this.registry.get("correlation_id")?.get();
  }
}

describe("LoggingModule over HTTP", () => {
  const ENV_KEYS = ["LOG_LEVEL", "LOG_CONTEXTS", "LOG_CONFIG_PATH"] as const;
  const saved = new Map<string, string | undefined>();
  const access = new MemoryStream();
  let app: INestApplication;
  let baseUrl: string;

  const accessLine = (route: string): string | undefined =>
    access.lines.find((line) => line.includes(`]: ${route} `));

  beforeAll(async () => {
    for (const key of ENV_KEYS) saved.set(key, process.env[key]);
    process.env.LOG_LEVEL = "info";
    process.env.LOG_CONTEXTS = "correlation_id";
    process.env.LOG_CONFIG_PATH = join(tmpdir(), "logging-e2e-missing.yaml");

    const moduleRef = await Test.createTestingModule({
      imports: [ConfigModule.forRoot({ ignoreEnvFile: true }), LoggingModule],
      controllers: [OrdersController],
    }).compile();

    app = moduleRef.createNestApplication({ logger: false });
    await app.listen(0, "127.0.0.1");
    baseUrl = await app.getUrl();

    app.get(LogConfigurationUseCase).configure({
      extra: {
        handlers: { access_console: { class: "stream", stream: access } },
      },
    });
    await flush();
  });

  afterAll(async () => {
    await app.close();
    for (const [key, value] of saved) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  });

  it("should keep overlapping requests isolated in responses and access lines", async () => {
    const [slow, fast] = await Promise.all([
      fetch(`${baseUrl}/orders/a?delay=40`, { headers: { "x-correlation-id": "c-a" } }),
      fetch(`${baseUrl}/orders/b?delay=5`, { headers: { "x-correlation-id": "c-b" } }),
    ]);
    await flush();

    expect(await slow.json()).toEqual({ id: "a", before: "c-a", after: "c-a" });
    expect(await fast.json()).toEqual({ id: "b", before: "c-b", after: "c-b" });
    expect(slow.headers.get("x-correlation-id")).toBe("c-a");
    expect(fast.headers.get("x-correlation-id")).toBe("c-b");
    expect(accessLine("GET /orders/a?delay=40 200")).toContain("[correlation_id: c-a]");
    expect(accessLine("GET /orders/b?delay=5 200")).toContain("[correlation_id: c-b]");
  });

  it("should generate a correlation id when the header is missing", async () => {
    const response = await fetch(`${baseUrl}/orders/c?delay=0`);
    const body = await response.json();

    expect(response.headers.get("x-correlation-id")).toMatch(/^[0-9a-f-]{36}$/);
    expect(body).toEqual({
      id: "c",
      before: response.headers.get("x-correlation-id"),
      after: response.headers.get("x-correlation-id"),
    });
  });

  it("should not fail handlers that send the response themselves", async () => {
    const response = await fetch(`${baseUrl}/raw`, {
      headers: { "x-correlation-id": "c-raw" },
    });
    await flush();

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ ok: true });
    expect(response.headers.get("x-correlation-id")).toBeNull();
    expect(accessLine("GET /raw 200")).toContain("[correlation_id: c-raw]");
  });

  it("should reset the context and skip the header when the handler fails", async () => {
    const response = await fetch(`${baseUrl}/fail`, {
      headers: { "x-correlation-id": "c-f" },
    });
    await flush();

    expect(response.status).toBe(500);
    expect(response.headers.get("x-correlation-id")).toBeNull();
    expect(accessLine("GET /fail 500")).toContain("[correlation_id: c-f]");
    expect(app.get(OrdersController).readFailedSlot()).toBe("-");
  });
});
