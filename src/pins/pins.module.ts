import { Module } from '@nestjs/common';
import { PinsService } from './pins.service';

@Module({
  providers: [PinsService],
  exports: [PinsService],
})
export class PinsModule {}
