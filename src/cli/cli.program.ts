import { INestApplicationContext, Logger } from '@nestjs/common';
import { Command } from 'commander';
import { CommandsService } from './commands.service';
import {
  AuthOptionsDto,
  ConfigOptionsDto,
  ContactsOptionsDto,
  SendOptionsDto,
} from './dto';
import { InteractiveService, describeError } from './interactive.service';
import { OutputSink, toErrorPayload, writeJson } from './output';
import { Prompter } from './prompter';

/**
 * Process-level effects of the program, replaceable in tests
 */
export interface CliRuntime {
  stdout: OutputSink;
  createPrompter(): Prompter;
  setExitCode(code: number): void;
}

const logger = new Logger('Cli');

/**
 * Print the payload of `action`, or its error payload with exit code 1
 */
export async function runJsonCommand(
  runtime: CliRuntime,
  action: () => Promise<object>,
): Promise<void> {
  try {
    writeJson(runtime.stdout, await action());
  } catch (error) {
    const payload = toErrorPayload(error);
    if (payload.error === 'InternalError') {
      logger.error(
        payload.message,
        error instanceof Error ? error.stack : undefined,
      );
    } else {
      logger.debug(`${payload.error}: ${payload.message}`);
    }
    writeJson(runtime.stdout, payload);
    runtime.setExitCode(1);
  }
}

export function buildProgram(
  app: INestApplicationContext,
  runtime: CliRuntime,
): Command {
  const commands = app.get(CommandsService);
  const interactive = app.get(InteractiveService);

  const program = new Command()
    .exitOverride()
    .name('tgsend')
    .description('Send files to Telegram contacts from the terminal')
    .argument('[file]', 'file to send, choosing the contact interactively')
    .action(async (file?: string) => {
      if (!file) {
        program.outputHelp();
        return;
      }
      const prompter = runtime.createPrompter();
      try {
        await interactive.run(file, prompter);
      } catch (error) {
        prompter.error(describeError(error));
        runtime.setExitCode(1);
      }
    });

  program
    .command('config')
    .description('Save Telegram API credentials, or show whether they are set')
    .option('--api-id <id>', 'API ID from my.telegram.org')
    .option('--api-hash <hash>', 'API hash from my.telegram.org')
    .action((options: ConfigOptionsDto) =>
      runJsonCommand(runtime, () => commands.config(options)),
    );

  program
    .command('status')
    .description('Show configuration and login status')
    .action(() => runJsonCommand(runtime, () => commands.status()));

  program
    .command('auth')
    .description('Log in with a phone number, login code and 2FA password')
    .option('--phone <phone>', 'phone number in international format')
    .option('--code <code>', 'login code received from Telegram')
    .option('--password <password>', 'two-factor password')
    .option('--phone-code-hash <hash>', 'hash returned when the code was sent')
    .action((options: AuthOptionsDto) =>
      runJsonCommand(runtime, () => commands.auth(options)),
    );

  program
    .command('logout')
    .description('Log out and forget the session')
    .action(() => runJsonCommand(runtime, () => commands.logout()));

  program
    .command('contacts')
    .description('List contacts, pinned first')
    .option('--search <query>', 'fuzzy search by name')
    .option('--pinned-only', 'only pinned contacts')
    .option('--refresh', 'ignore the cached contact list')
    .option(
      '-l, --limit <n>',
      'most dialogs to fetch (default: TGSEND_DIALOG_LIMIT)',
    )
    .action((options: ContactsOptionsDto) =>
      runJsonCommand(runtime, () => commands.contacts(options)),
    );

  program
    .command('send')
    .description('Send a file to a contact')
    .argument('<file>', 'file to send')
    .option('--to <name>', 'contact name (fuzzy matched)')
    .option('--to-id <id>', 'contact id')
    .action((file: string, options: SendOptionsDto) =>
      runJsonCommand(runtime, () => commands.send(file, options)),
    );

  program
    .command('pin')
    .description('Pin a contact so it is listed first')
    .argument('<contact>', 'contact name or id (use -- before negative ids)')
    .action((reference: string) =>
      runJsonCommand(runtime, () => commands.pin(reference)),
    );

  program
    .command('unpin')
    .description('Unpin a contact')
    .argument('<contact>', 'contact name or id (use -- before negative ids)')
    .action((reference: string) =>
      runJsonCommand(runtime, () => commands.unpin(reference)),
    );

  program
    .command('pinned')
    .description('List pinned contacts')
    .action(() => runJsonCommand(runtime, () => commands.pinned()));

  return program;
}
