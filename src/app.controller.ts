import { Controller, Get } from "@nestjs/common";
import { AppService, RequestContextView } from "./app.service";

@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get("health")
  getHealth(): { status: string; message: string } {
    return this.appService.getHealth();
  }

  @Get("context")
  getContext(): RequestContextView {
    return this.appService.describeContext();
  }
}
