import { Module } from '@nestjs/common';
import { ContactsModule } from '../contacts/contacts.module';
import { CredentialsModule } from '../credentials/credentials.module';
import { PinsModule } from '../pins/pins.module';
import { TelegramClientModule } from '../telegram-client/telegram-client.module';
import { CommandsService } from './commands.service';
import { InteractiveService } from './interactive.service';

@Module({
  imports: [CredentialsModule, TelegramClientModule, ContactsModule, PinsModule],
  providers: [CommandsService, InteractiveService],
  exports: [CommandsService, InteractiveService],
})
export class CliModule {}
