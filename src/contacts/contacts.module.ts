import { Module } from '@nestjs/common';
import { PinsModule } from '../pins/pins.module';
import { TelegramClientModule } from '../telegram-client/telegram-client.module';
import { ContactSelectionService } from './contact-selection.service';
import { FuzzyMatcher } from './fuzzy-matcher';

@Module({
  imports: [TelegramClientModule, PinsModule],
  providers: [FuzzyMatcher, ContactSelectionService],
  exports: [FuzzyMatcher, ContactSelectionService],
})
export class ContactsModule {}
