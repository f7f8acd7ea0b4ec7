import { Injectable, Logger } from "@nestjs/common";
import { LogContextRegistry } from "@logging";

export interface RequestContextView {
  [contextName: string]: unknown;
}

@Injectable()
export class AppService {
  private readonly logger = new Logger(AppService.name);

  constructor(private readonly registry: LogContextRegistry) {}

  getHealth(): { status: string; message: string } {
    return {
      status: "ok",
      message: "Health check passed",
    };
  }

  /**
   * Current value of every registered log context, as seen by this request.
   */
  describeContext(): RequestContextView {
    const view: RequestContextView = {};
    for (const [name, context] of this.registry.contexts) {
      view[name] = context.get();
    }
    this.logger.log("Describing request context");
    return view;
  }
}
