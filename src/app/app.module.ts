import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { CommonModule } from './common.module';
import { StorageModule } from '../storage/storage.module';
import { CardsModule } from '../modules/cards/cards.module';
import { TrackingModule } from '../modules/tracking/tracking.module';
import { QrModule } from '../modules/qr/qr.module';
import { AdminModule } from '../modules/admin/admin.module';
import { HealthModule } from '../modules/health/health.module';
// middleware
import { LoggingMiddleware } from './middleware/logging.middleware';

@Module({
  imports: [
    CommonModule,
    StorageModule,
    CardsModule,
    TrackingModule,
    QrModule,
    AdminModule,
    HealthModule,
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(LoggingMiddleware).forRoutes('*');
  }
}
