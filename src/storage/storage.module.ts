import { Module, Global } from '@nestjs/common';
import { AppConfigService } from '../app/configs/app-config.service';
import { CardDirectory } from './card-directory';
import { CountersStore } from './counters.store';
import { AdminPasswordStore } from './admin-password.store';

/**
 * File-backed stores, built once at startup from the configured paths.
 * A missing cards file aborts startup.
 */
@Global()
@Module({
  providers: [
    {
      provide: CardDirectory,
      inject: [AppConfigService],
      useFactory: async (configService: AppConfigService) => {
        const directory = new CardDirectory(
          configService.cardsFile,
          configService.defaultCardSlug,
        );
        await directory.assertReadable();
        return directory;
      },
    },
    {
      provide: CountersStore,
      inject: [AppConfigService, CardDirectory],
      useFactory: async (
        configService: AppConfigService,
        directory: CardDirectory,
      ) =>
        new CountersStore(
          configService.countersFile,
          await directory.getDefaultSlug(),
        ),
    },
    {
      provide: AdminPasswordStore,
      inject: [AppConfigService],
      useFactory: (configService: AppConfigService) =>
        new AdminPasswordStore(configService.adminPasswordFile),
    },
  ],
  exports: [CardDirectory, CountersStore, AdminPasswordStore],
})
export class StorageModule {}
