import type { Command } from 'commander';
import yaml from 'js-yaml';

import { getConfigValue, initConfig, loadConfig } from '@/services/config-loader.js';
import { formatConfigValue } from '@/utils/cli-helpers.js';
import { printError, ProxyError } from '@/utils/error-handler.js';
import { getConfigFilePath } from '@/utils/path-helper.js';

interface ConfigCommandOptions {
  config?: string;
}

/**
 * Register 'acp-proxy config show|get|init'
 */
export function registerConfigCommand(program: Command): void {
  const config = program.command('config').description('Inspect or initialize the proxy configuration');

  config
    .command('show')
    .description('Print the effective configuration (file, defaults and environment)')
    .option('-c, --config <path>', 'Config file path')
    .action(async (options: ConfigCommandOptions) => {
      try {
        const effective = await loadConfig(getConfigFilePath(options.config));
        process.stdout.write(yaml.dump(effective, { indent: 2 }));
      } catch (error) {
        printError(error);
        process.exitCode = 1;
      }
    });

  config
    .command('get')
    .description('Print one configuration value')
    .argument('<key>', 'Dotted key, e.g. agent.mode')
    .option('-c, --config <path>', 'Config file path')
    .action(async (key: string, options: ConfigCommandOptions) => {
      try {
        const effective = await loadConfig(getConfigFilePath(options.config));
        const value = getConfigValue(effective, key);
        if (value === undefined) {
          throw new ProxyError(`Unknown config key: ${key}`, 'E_UNKNOWN_CONFIG_KEY');
        }
        console.log(formatConfigValue(value));
      } catch (error) {
        printError(error);
        process.exitCode = 1;
      }
    });

  config
    .command('init')
    .description('Write the default configuration file if it does not exist')
    .option('-c, --config <path>', 'Config file path')
    .action(async (options: ConfigCommandOptions) => {
      try {
        const result = await initConfig(getConfigFilePath(options.config));
        if (result.created) {
          console.log(`✅ Wrote default configuration to ${result.path}`);
        } else {
          console.log(`Configuration already exists at ${result.path}`);
        }
      } catch (error) {
        printError(error);
        process.exitCode = 1;
      }
    });
}
