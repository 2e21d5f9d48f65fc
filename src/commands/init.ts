import { Command } from 'commander';
import path from 'node:path';
import { ConfigLoader } from '../config/loader';
import { DEFAULT_CONFIG_FILENAME } from '../config/defaults';
import { logger } from '../utils/logger';

export const initCommand = new Command('init')
  .description(`Initialize a default ${DEFAULT_CONFIG_FILENAME} configuration file`)
  .action(() => {
    const configPath = path.join(process.cwd(), DEFAULT_CONFIG_FILENAME);

    try {
      ConfigLoader.writeDefault(configPath);
      logger.info(`Created ${configPath}`);
    } catch (error) {
      logger.error(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  });
