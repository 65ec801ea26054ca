import { Controller, Get } from '@nestjs/common';
import { NotificationDispatchService } from './notifications/notification-dispatch.service';
import { type EngineRunSummary, SignalsEngineService } from './signals-engine/signals-engine.service';

@Controller('health')
export class HealthController {
  constructor(
    private readonly signalsEngineService: SignalsEngineService,
    private readonly notificationDispatchService: NotificationDispatchService,
  ) {}

  @Get()
  health(): { ok: true } {
    return { ok: true };
  }

  @Get('engine')
  engine(): {
    ok: true;
    lastRun: EngineRunSummary | null;
    throttleKeys: number;
    enabledChannels: string[];
  } {
    return {
      ok: true,
      lastRun: this.signalsEngineService.getLastRunSummary(),
      throttleKeys: this.signalsEngineService.getThrottleSize(),
      enabledChannels: this.notificationDispatchService.getEnabledChannels(),
    };
  }
}
