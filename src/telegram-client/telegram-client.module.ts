import { Module } from '@nestjs/common';
import { CredentialsModule } from '../credentials/credentials.module';
import { MESSAGING_TRANSPORT } from './interfaces/messaging-transport.interface';
import { AuthService } from './services/auth.service';
import { ContactsService } from './services/contacts.service';
import { FileSenderService } from './services/file-sender.service';
import { SessionStoreService } from './services/session-store.service';
import { TelegramClientConfig } from './telegram-client.config';
import { TelegramClientService } from './telegram-client.service';

/**
 * Telegram Client Module
 * Provides access to Telegram Client API (MTProto) using gramjs:
 * login state machine, dialogs and file upload
 */
@Module({
  imports: [CredentialsModule],
  providers: [
    TelegramClientConfig,
    TelegramClientService,
    {
      provide: MESSAGING_TRANSPORT,
      useExisting: TelegramClientService,
    },
    SessionStoreService,
    AuthService,
    ContactsService,
    FileSenderService,
  ],
  exports: [AuthService, ContactsService, FileSenderService],
})
export class TelegramClientModule {}
