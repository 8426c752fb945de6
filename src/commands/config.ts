import chalk from 'chalk';
import type { ArgumentsCamelCase } from 'yargs';
import {
  CONFIG_KEYS,
  type ConfigKey,
  PersistentConfig,
  getConfigPath,
  isConfigKey,
  readConfigFile,
  writeConfigFile,
} from '../config-manager.js';
import { ConfigError } from '../report/errors.js';
import type { Command } from './types.js';

const ACTION_CHOICES = ['get', 'set', 'unset', 'list', 'path'] as const;
type ConfigAction = (typeof ACTION_CHOICES)[number];

type ConfigOptions = {
  action: ConfigAction;
  key?: string;
  value?: string;
};

type ConfigArgs = ArgumentsCamelCase<ConfigOptions>;

const command: Command<ConfigArgs> = {
  command: 'config <action> [key] [value]',
  describe: 'Manage default report settings',

  builder: (yargs) => {
    return yargs
      .positional('action', {
        describe: 'The configuration action',
        type: 'string',
        choices: ACTION_CHOICES,
        demandOption: true,
      })
      .positional('key', {
        describe: `The configuration key (${CONFIG_KEYS.join(', ')})`,
        type: 'string',
      })
      .positional('value', {
        describe: 'The configuration value (for "set")',
        type: 'string',
      })
      .check((argv) => {
        if (argv.action === 'set' && (!argv.key || argv.value === undefined)) {
          throw new Error('The "set" action requires a key and a value.');
        }
        if ((argv.action === 'get' || argv.action === 'unset') && !argv.key) {
          throw new Error(`The "${argv.action}" action requires a key.`);
        }
        return true;
      })
      .example('$0 config set capexThreshold 1000', 'Set the default threshold')
      .example('$0 config get capexColumn', 'Get the default CAPEX column')
      .example('$0 config unset groupBy', 'Remove the default group column')
      .example('$0 config list', 'List all configuration settings')
      .example('$0 config path', 'Show config file path');
  },

  handler: async (argv) => {
    const { action, key, value } = argv;

    try {
      switch (action) {
        case 'set': {
          if (!key || value === undefined) {
            throw new ConfigError('The "set" action requires both key and value.');
          }
          const configKey = requireConfigKey(key);
          const check = PersistentConfig.safeParse({ [configKey]: value });
          if (!check.success) {
            throw new ConfigError(`Invalid value for "${configKey}": ${value}`);
          }
          const config = await readConfigFile();
          config[configKey] = value;
          await writeConfigFile(config);
          console.log(chalk.green(`✓ Set "${configKey}" to "${value}"`));
          console.log(chalk.dim(`  Config file: ${getConfigPath()}`));
          break;
        }

        case 'get': {
          const configKey = requireConfigKey(key);
          const config = await readConfigFile();
          const configValue = config[configKey];
          if (configValue !== undefined) {
            console.log(configValue);
          } else {
            console.log(chalk.yellow(`Not set`));
          }
          break;
        }

        case 'unset': {
          const configKey = requireConfigKey(key);
          const config = await readConfigFile();
          if (configKey in config) {
            delete config[configKey];
            await writeConfigFile(config);
            console.log(chalk.green(`✓ Removed "${configKey}"`));
          } else {
            console.log(chalk.yellow(`"${configKey}" was not set`));
          }
          break;
        }

        case 'list': {
          const config = await readConfigFile();
          if (Object.keys(config).length === 0) {
            console.log(chalk.yellow('No configuration settings found.'));
            console.log(chalk.dim(`Config file: ${getConfigPath()}`));
          } else {
            console.log(JSON.stringify(config, null, 2));
            console.log(chalk.dim(`\nConfig file: ${getConfigPath()}`));
          }
          break;
        }

        case 'path': {
          console.log(getConfigPath());
          break;
        }
      }
    } catch (error) {
      if (error instanceof Error) {
        console.error(chalk.red(`✗ Error: ${error.message}`));
      } else {
        console.error(chalk.red('✗ Unknown error:'), error);
      }
      process.exit(1);
    }
  },
};

export default command;

function requireConfigKey(key: string | undefined): ConfigKey {
  if (!key || !isConfigKey(key)) {
    throw new ConfigError(
      `Unknown configuration key "${key ?? ''}". Use one of: ${CONFIG_KEYS.join(', ')}`,
    );
  }
  return key;
}
