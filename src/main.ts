#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { CommanderError } from 'commander';
import { AppModule } from './app.module';
import { CliRuntime, buildProgram } from './cli/cli.program';
import { toErrorPayload, writeJson } from './cli/output';
import { createClackPrompter } from './cli/prompter';
import { CliLogger } from './common/logger/cli-logger';

const runtime: CliRuntime = {
  stdout: process.stdout,
  createPrompter: createClackPrompter,
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

async function bootstrap(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
    abortOnError: false,
  });
  app.useLogger(app.get(CliLogger));

  try {
    const program = buildProgram(app, runtime);
    await program.parseAsync(process.argv);
  } catch (error) {
    // commander has already printed usage errors and help
    if (error instanceof CommanderError) {
      runtime.setExitCode(error.exitCode);
      return;
    }
    throw error;
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  writeJson(process.stdout, toErrorPayload(error));
  process.exitCode = 1;
});
