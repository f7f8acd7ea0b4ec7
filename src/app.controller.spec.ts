import { Test, TestingModule } from "@nestjs/testing";
import { CorrelationIdContext, UserIdContext } from "@logging/domain";
import { LogContextRegistry } from "@logging/service";
import { AppController } from "./app.controller";
import { AppService } from "./app.service";

describe("AppController", () => {
  let controller: AppController;
  let correlation: CorrelationIdContext;

  beforeEach(async () => {
    const registry = new LogContextRegistry();
    correlation = new CorrelationIdContext();
    registry.register("correlation_id", correlation);
    registry.register("user_id", new UserIdContext());

    const module: TestingModule = await Test.createTestingModule({
      controllers: [AppController],
      providers: [AppService, { provide: LogContextRegistry, useValue: registry }],
    })
      .setLogger({ log: jest.fn(), error: jest.fn(), warn: jest.fn() })
      .compile();

    controller = module.get<AppController>(AppController);
  });

  it("should be defined", () => {
    expect(controller).toBeDefined();
  });

  it("should report health", () => {
    expect(controller.getHealth()).toEqual({
      status: "ok",
      message: "Health check passed",
    });
  });

  it("should describe the defaults outside of a request", () => {
    expect(controller.getContext()).toEqual({
      correlation_id: "-",
      user_id: "anonymous",
    });
  });

  it("should describe the values bound to the current request", () => {
    const view = correlation.runInScope(() => {
      correlation.set("abc-123");
      return controller.getContext();
    });

    expect(view).toEqual({ correlation_id: "abc-123", user_id: "anonymous" });
  });
});
