import { Module } from '@nestjs/common';
import { CardsModule } from '../cards/cards.module';
import { TrackingController } from './tracking.controller';
import { TrackingService } from './tracking.service';

@Module({
  imports: [CardsModule],
  controllers: [TrackingController],
  providers: [TrackingService],
})
export class TrackingModule {}
