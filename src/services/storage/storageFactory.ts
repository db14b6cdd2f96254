import { GraphStorage } from '../../types/index.js';
import { StorageSettings } from '../config.js';
import { Logger } from '../logger.js';
import { MemoryGraphStorage } from './memoryGraphStorage.js';
import { TableStorageManager } from './tableStorageManager.js';

export function createGraphStorage(settings: StorageSettings, logger: Logger): GraphStorage {
  if (settings.kind === 'table') {
    logger.info(`Using Azure Table Storage account: ${settings.accountName}`);
    return new TableStorageManager({
      accountName: settings.accountName,
      connectionString: settings.connectionString,
      tablePrefix: settings.tablePrefix,
    }, logger);
  }

  if (!settings.filePath) {
    logger.warn('No storage configured; the graph lives in memory and is lost on exit');
  }
  return new MemoryGraphStorage(logger, settings.filePath);
}
