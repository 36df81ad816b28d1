import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Query,
  Redirect,
} from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import {
  mailtoUrl,
  mapUrl,
  TrackingService,
  whatsappUrl,
} from './tracking.service';

@ApiTags('tracking')
@Controller('go')
export class TrackingController {
  constructor(private readonly trackingService: TrackingService) {}

  @Get('whatsapp/:slug')
  @Redirect('', 302)
  @ApiOperation({ summary: 'Count a WhatsApp click and open the chat' })
  @ApiQuery({ name: 'text', required: false, type: String })
  async whatsapp(@Param('slug') slug: string, @Query('text') text?: string) {
    const { card } = await this.trackingService.track(slug, 'whatsapp_clicks');
    return { url: whatsappUrl(card, text) };
  }

  @Get('email/:slug')
  @Redirect('', 302)
  @ApiOperation({ summary: 'Count an email click and open the mail client' })
  @ApiQuery({ name: 'subject', required: false, type: String })
  async email(
    @Param('slug') slug: string,
    @Query('subject') subject?: string,
  ) {
    const { card } = await this.trackingService.track(slug, 'email_clicks');
    return { url: mailtoUrl(card, subject) };
  }

  @Get('map/:slug')
  @Redirect('', 302)
  @ApiOperation({ summary: 'Count a map click and open the map search' })
  async map(@Param('slug') slug: string) {
    const { card } = await this.trackingService.track(slug, 'map_clicks');
    return { url: mapUrl(card) };
  }

  @Get('share/:slug')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Count a share of the card' })
  async share(@Param('slug') slug: string): Promise<void> {
    await this.trackingService.track(slug, 'share_clicks');
  }

  @Get('nfc/:slug')
  @Redirect('', 302)
  @ApiOperation({ summary: 'Count an NFC tap or QR scan and show the card' })
  async nfc(@Param('slug') slug: string) {
    const { card } = await this.trackingService.track(slug, 'nfc_scans');
    return { url: `/c/${encodeURIComponent(card.slug)}` };
  }
}
