import {
  Controller,
  Get,
  Logger,
  Param,
  Redirect,
  Res,
} from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import type { Response } from 'express';
import { CardsService } from './cards.service';
import { VcardService } from './vcard.service';
import { renderCardPage } from './views/card.view';
import { CountersStore } from '../../storage/counters.store';
import { STATIC_PREFIX } from '../../app/app.setup';

@ApiTags('cards')
@Controller()
export class CardsController {
  private readonly logger = new Logger(CardsController.name);

  constructor(
    private readonly cardsService: CardsService,
    private readonly vcardService: VcardService,
    private readonly countersStore: CountersStore,
  ) {}

  @Get()
  @Redirect('/', 302)
  @ApiOperation({ summary: 'Redirect to the default card' })
  async home() {
    const slug = await this.cardsService.findDefaultSlug();
    return { url: `/c/${encodeURIComponent(slug)}` };
  }

  // Must stay above `c/:slug`, which would otherwise match "<slug>.vcf"
  @Get('c/:slug.vcf')
  @ApiOperation({ summary: 'Download the card as a vCard' })
  async downloadVcard(
    @Param('slug') slug: string,
    @Res({ passthrough: true }) res: Response,
  ): Promise<string> {
    const card = await this.cardsService.findOne(slug);
    const vcard = await this.vcardService.build(card);

    // attachment() guesses a type from the extension; override it afterwards
    res.attachment(vcard.filename).set({
      'Content-Type': 'text/vcard; charset=utf-8',
      'Cache-Control': 'no-store',
    });
    await this.countersStore.increment(slug, 'contact_shared');

    this.logger.log(`vCard downloaded: ${slug}`);
    return vcard.body;
  }

  @Get('c/:slug')
  @ApiOperation({ summary: 'Card page' })
  async findOne(
    @Param('slug') slug: string,
    @Res({ passthrough: true }) res: Response,
  ): Promise<string> {
    const card = await this.cardsService.findOne(slug);
    res.type('html');
    return renderCardPage(card, { staticPrefix: STATIC_PREFIX });
  }
}
