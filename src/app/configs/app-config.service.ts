import { Injectable, OnModuleInit, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as path from 'path';

@Injectable()
export class AppConfigService implements OnModuleInit {
  private readonly logger = new Logger(AppConfigService.name);

  constructor(private configService: ConfigService) {}

  onModuleInit() {
    const requiredKeys = ['ADMIN_SECRET'];

    const missingKeys = requiredKeys.filter(
      (key) => !this.configService.get(key),
    );

    if (missingKeys.length > 0) {
      const message = `Missing required environment variables: ${missingKeys.join(', ')}`;
      this.logger.error(message);
      throw new Error(message);
    }

    if (!this.adminPassword) {
      this.logger.warn(
        'ADMIN_PASSWORD is not set; admin login works only once a password hash has been persisted.',
      );
    }
    if (!this.adminResetKey) {
      this.logger.log('ADMIN_RESET_KEY is not set; password reset is disabled.');
    }

    this.logger.log('All required environment variables are present.');
  }

  get port(): number {
    return Number(this.configService.get<string>('PORT', '3000'));
  }

  get isProduction(): boolean {
    return this.configService.get<string>('NODE_ENV') === 'production';
  }

  get isDevelopment(): boolean {
    return this.configService.get<string>('NODE_ENV') !== 'production';
  }

  // Files
  get dataDir(): string {
    return path.resolve(this.configService.get<string>('DATA_DIR', './data'));
  }

  get cardsFile(): string {
    return this.resolveDataFile('CARDS_FILE', 'cards.json');
  }

  get countersFile(): string {
    return this.resolveDataFile('COUNTERS_FILE', 'counters.json');
  }

  get adminPasswordFile(): string {
    return this.resolveDataFile('ADMIN_PASSWORD_FILE', 'admin_password.json');
  }

  get staticDir(): string {
    return path.resolve(
      this.configService.get<string>('STATIC_DIR', './static'),
    );
  }

  // Cards
  get defaultCardSlug(): string | undefined {
    return this.configService.get<string>('DEFAULT_CARD_SLUG') || undefined;
  }

  get publicBaseUrl(): string | undefined {
    const url = this.configService.get<string>('PUBLIC_BASE_URL');
    return url ? url.replace(/\/+$/, '') : undefined;
  }

  // Admin
  get adminPassword(): string | undefined {
    return this.configService.get<string>('ADMIN_PASSWORD') || undefined;
  }

  get adminSecret(): string {
    return this.configService.get<string>('ADMIN_SECRET', '');
  }

  get adminResetKey(): string | undefined {
    return this.configService.get<string>('ADMIN_RESET_KEY') || undefined;
  }

  get adminSessionTtlSeconds(): number {
    const hours = Number(
      this.configService.get<string>('ADMIN_SESSION_TTL_HOURS', '12'),
    );
    return Number.isFinite(hours) && hours > 0
      ? Math.round(hours * 3600)
      : 12 * 3600;
  }

  private resolveDataFile(key: string, fallback: string): string {
    const configured = this.configService.get<string>(key);
    return configured
      ? path.resolve(configured)
      : path.join(this.dataDir, fallback);
  }
}
