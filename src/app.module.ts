import { Module } from '@nestjs/common';
import { CliModule } from './cli/cli.module';
import { AppConfigModule } from './common/config/app-config.module';
import { LoggerModule } from './common/logger/logger.module';
import { ContactsModule } from './contacts/contacts.module';
import { CredentialsModule } from './credentials/credentials.module';
import { PinsModule } from './pins/pins.module';
import { TelegramClientModule } from './telegram-client/telegram-client.module';

@Module({
  imports: [
    AppConfigModule,
    LoggerModule,
    CredentialsModule,
    TelegramClientModule,
    PinsModule,
    ContactsModule,
    CliModule,
  ],
})
export class AppModule {}
