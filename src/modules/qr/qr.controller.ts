import { Controller, Get, Param, Req, Res, StreamableFile } from '@nestjs/common';
import { ApiOperation, ApiProduces, ApiTags } from '@nestjs/swagger';
import type { Request, Response } from 'express';
import { AppConfigService } from '../../app/configs/app-config.service';
import { CardsService } from '../cards/cards.service';
import { QrService } from './qr.service';

@ApiTags('qr')
@Controller()
export class QrController {
  constructor(
    private readonly qrService: QrService,
    private readonly cardsService: CardsService,
    private readonly appConfigService: AppConfigService,
  ) {}

  @Get('qr.png')
  @ApiProduces('image/png')
  @ApiOperation({ summary: 'QR code for the default card' })
  async defaultQr(
    @Req() req: Request,
    @Res({ passthrough: true }) res: Response,
  ): Promise<StreamableFile> {
    const slug = await this.cardsService.findDefaultSlug();
    return this.render(slug, req, res);
  }

  @Get('qr/:slug.png')
  @ApiProduces('image/png')
  @ApiOperation({ summary: 'QR code pointing at the NFC-tracking URL' })
  async cardQr(
    @Param('slug') slug: string,
    @Req() req: Request,
    @Res({ passthrough: true }) res: Response,
  ): Promise<StreamableFile> {
    return this.render(slug, req, res);
  }

  private async render(
    slug: string,
    req: Request,
    res: Response,
  ): Promise<StreamableFile> {
    const card = await this.cardsService.findOne(slug);
    const target = `${this.baseUrl(req)}/go/nfc/${encodeURIComponent(card.slug)}`;
    const png = await this.qrService.toPng(target);
    // Only successful renders are cacheable
    res.set('Cache-Control', 'public, max-age=3600');
    return new StreamableFile(png, { type: 'image/png' });
  }

  private baseUrl(req: Request): string {
    return (
      this.appConfigService.publicBaseUrl ??
      `${req.protocol}://${req.get('host') ?? 'localhost'}`
    );
  }
}
