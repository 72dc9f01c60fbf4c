#!/usr/bin/env node

import { Command } from 'commander';

import { registerConfigCommand } from '@/commands/config.js';
import { registerProxyCommand } from '@/commands/proxy.js';
import { DEFAULT_CONFIG } from '@/config/defaults.js';
import { printError } from '@/utils/error-handler.js';

const program = new Command();

program
  .name('acp-proxy')
  .description('Multiplexing ACP proxy: one editor connection, one agent process per session')
  .version(DEFAULT_CONFIG.server.version)
  // Root options stay in front of subcommands so `config show -c` reaches the subcommand
  .enablePositionalOptions()
  .showHelpAfterError('(add --help for additional information)');

program.exitOverride((err) => {
  if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(err.exitCode);
  }

  if (err.code === 'commander.excessArguments' || err.code === 'commander.unknownOption') {
    console.error(`💡 Run 'acp-proxy --help' to see available commands and options\n`);
    process.exit(1);
  }

  if (err.code === 'commander.missingArgument') {
    console.error(`💡 Run the command with '--help' to see required arguments\n`);
    process.exit(1);
  }

  throw err;
});

registerConfigCommand(program);
registerProxyCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  printError(error);
  process.exitCode = 1;
});
