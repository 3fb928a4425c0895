import { Global, Module } from '@nestjs/common';
import { CliLogger } from './cli-logger';

@Global()
@Module({
  providers: [CliLogger],
  exports: [CliLogger],
})
export class LoggerModule {}
