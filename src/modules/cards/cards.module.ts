import { Module } from '@nestjs/common';
import { CardsController } from './cards.controller';
import { CardsService } from './cards.service';
import { VcardService } from './vcard.service';

@Module({
  controllers: [CardsController],
  providers: [CardsService, VcardService],
  exports: [CardsService],
})
export class CardsModule {}
