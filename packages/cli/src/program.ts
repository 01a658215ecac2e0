/**
 * docdrop command tree
 */

import { Command } from 'commander';
import { configShow, startAgent, type CliFlags } from './commands/index.js';

function addConfigOptions(command: Command): Command {
  return command
    .option('--api-id <id>', 'Telegram API id (or TELEGRAM_API_ID)')
    .option('--api-hash <hash>', 'Telegram API hash (or TELEGRAM_API_HASH)')
    .option('--phone <number>', 'Phone number of the account to log in as (or TELEGRAM_PHONE)')
    .option('--folder <path>', 'Folder documents are saved to (or TELEGRAM_FOLDER)')
    .option('--user <id>', 'Only accept documents from this user id (or TELEGRAM_USER_ID)')
    .option('--channel <id>', 'Listen in this channel or group instead of direct messages (or TELEGRAM_CHANNEL_ID)')
    .option('--types <list>', 'Comma-separated allowed extensions, e.g. pdf,docx (or TELEGRAM_ALLOWED_TYPES)')
    .option('--max-size <bytes>', 'Largest accepted document in bytes (or TELEGRAM_MAX_FILE_SIZE)')
    .option('--debug', 'Verbose logging (or TELEGRAM_DEBUG)')
    .option('--session <path>', 'Session file (or TELEGRAM_SESSION_FILE)')
    .option('--code-file <path>', 'File the login code is written to (or TELEGRAM_CODE_FILE)')
    .option('--password-file <path>', 'File the two-step password is written to (or TELEGRAM_PASSWORD_FILE)');
}

export function createProgram(env: NodeJS.ProcessEnv = process.env): Command {
  const program = new Command();

  program
    .name('docdrop')
    .description('Save documents sent by one allowed Telegram user to a local folder')
    .version('0.1.0');

  addConfigOptions(
    program
      .command('start', { isDefault: true })
      .description('Log in and start accepting documents')
  ).action(async (options: CliFlags) => {
    await startAgent(options, env);
  });

  addConfigOptions(
    program
      .command('config')
      .description('Print the resolved configuration (secrets masked) and exit')
  ).action((options: CliFlags) => {
    configShow(options, env);
  });

  return program;
}
