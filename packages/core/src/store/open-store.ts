import { ConfigurationError } from '../shared/errors.js';
import { PostgresStoreDriver } from './postgres-driver.js';
import { SqliteStoreDriver } from './sqlite-driver.js';
import type { StoreDriver } from './types.js';

export interface StoreLocation {
  /** On-disk SQLite recorder file. */
  path?: string;
  /** Recorder `db_url`; only PostgreSQL URLs are supported. */
  url?: string;
  poolSize?: number;
}

export function openStore(location: StoreLocation): StoreDriver {
  if (location.url) {
    if (!/^postgres(ql)?:\/\//.test(location.url)) {
      throw new ConfigurationError('Only postgresql:// database URLs are supported', {
        url: location.url.replace(/\/\/[^@]*@/, '//***@'),
      });
    }
    return PostgresStoreDriver.connect({ connectionString: location.url, max: location.poolSize });
  }
  if (location.path) {
    return SqliteStoreDriver.open(location.path);
  }
  throw new ConfigurationError('Either a recorder database path or URL is required');
}
