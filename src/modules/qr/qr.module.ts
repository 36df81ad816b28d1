import { Module } from '@nestjs/common';
import { CardsModule } from '../cards/cards.module';
import { QrController } from './qr.controller';
import { QrService } from './qr.service';

@Module({
  imports: [CardsModule],
  controllers: [QrController],
  providers: [QrService],
  exports: [QrService],
})
export class QrModule {}
