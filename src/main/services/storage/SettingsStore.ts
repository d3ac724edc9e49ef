import Conf from 'conf';
import type { AppSettings } from '../../../shared/types';
import { DEFAULT_SETTINGS } from '../../../shared/types';
import { PROJECT_NAME } from '../../../shared/constants';
import { AppSettingsSchema, StoredSettingsSchema, validateInput } from '../../schemas';
import { ConfigError } from '../ai/errors';
import { createLogger } from '../../utils/logger';

const log = createLogger('SettingsStore');

type SettingsStoreSchema = {
  settings: unknown;
};

export interface StoreOptions {
  /** Directory holding the JSON file. Defaults to the per-user config dir. */
  cwd?: string;
}

/**
 * Persists application settings with conf.
 * Whatever is on disk is merged over DEFAULT_SETTINGS and validated on every
 * read, so a hand-edited file either loads completely or fails with a
 * ConfigError naming the bad fields.
 */
export class SettingsStore {
  private store: Conf<SettingsStoreSchema> | null = null;

  constructor(private readonly options: StoreOptions = {}) {}

  private getStore(): Conf<SettingsStoreSchema> {
    if (this.store) return this.store;
    try {
      this.store = new Conf<SettingsStoreSchema>({
        projectName: PROJECT_NAME,
        configName: 'settings',
        cwd: this.options.cwd,
        defaults: { settings: {} },
      });
    } catch (error) {
      // conf throws while parsing a file that is not valid JSON
      throw new ConfigError(`Could not read the settings file: ${error instanceof Error ? error.message : String(error)}`);
    }
    log.debug('settings file:', this.store.path);
    return this.store;
  }

  async getSettings(): Promise<AppSettings> {
    const store = this.getStore();
    const what = `settings file (${store.path})`;
    const stored = validateInput(StoredSettingsSchema, store.get('settings'), what);
    const merged = {
      ...DEFAULT_SETTINGS,
      ...stored,
      models: { ...DEFAULT_SETTINGS.models, ...stored.models },
      baseUrls: { ...DEFAULT_SETTINGS.baseUrls, ...stored.baseUrls },
    };
    return validateInput(AppSettingsSchema, merged, what);
  }
}
