import { Controller, Get } from '@nestjs/common';
import {
  HealthCheck,
  HealthCheckError,
  HealthCheckService,
  HealthIndicator,
  HealthIndicatorResult,
} from '@nestjs/terminus';
import * as fs from 'fs/promises';
import * as path from 'path';
import { CardDirectory } from '../../storage/card-directory';
import { CountersStore } from '../../storage/counters.store';

class DataFileHealthIndicator extends HealthIndicator {
  async isAccessible(
    key: string,
    target: string,
    mode: number,
  ): Promise<HealthIndicatorResult> {
    try {
      await fs.access(target, mode);
      return this.getStatus(key, true, { path: target });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new HealthCheckError(
        `${key} check failed`,
        this.getStatus(key, false, { path: target, message }),
      );
    }
  }
}

@Controller('health')
export class HealthController {
  private readonly files = new DataFileHealthIndicator();

  constructor(
    private health: HealthCheckService,
    private cardDirectory: CardDirectory,
    private countersStore: CountersStore,
  ) {}

  @Get()
  @HealthCheck()
  check() {
    return this.health.check([
      () =>
        this.files.isAccessible(
          'cards',
          this.cardDirectory.path,
          fs.constants.R_OK,
        ),
      // The counters file itself may not exist yet; its directory must be writable
      () =>
        this.files.isAccessible(
          'counters',
          path.dirname(this.countersStore.path),
          fs.constants.W_OK,
        ),
    ]);
  }
}
