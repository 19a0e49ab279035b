import { Global, Module } from "@nestjs/common";
import { EngineConfigService } from "./engine.config";

@Global()
@Module({
  providers: [EngineConfigService],
  exports: [EngineConfigService],
})
export class EngineConfigModule {}
