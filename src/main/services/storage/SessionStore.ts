import Conf from 'conf';
import type { ProviderName, SavedChat, Turn } from '../../../shared/types';
import { PROJECT_NAME } from '../../../shared/constants';
import { SavedChatSchema, validateInput } from '../../schemas';
import type { StoreOptions } from './SettingsStore';

type SessionStoreSchema = {
  chats: Record<string, unknown>;
};

export interface SavedChatSummary {
  name: string;
  provider: ProviderName;
  model: string;
  turnCount: number;
  updatedAt: string;
}

/**
 * Named chats saved with /save and restored with /load.
 * Entries are validated on the way out, so a damaged entry surfaces as a
 * ConfigError for that one chat rather than breaking the whole file.
 */
export class SessionStore {
  private store: Conf<SessionStoreSchema> | null = null;

  constructor(private readonly options: StoreOptions = {}) {}

  private getStore(): Conf<SessionStoreSchema> {
    if (!this.store) {
      this.store = new Conf<SessionStoreSchema>({
        projectName: PROJECT_NAME,
        configName: 'chats',
        cwd: this.options.cwd,
        defaults: { chats: {} },
      });
    }
    return this.store;
  }

  async hasSession(name: string): Promise<boolean> {
    return Object.hasOwn(this.getStore().get('chats'), name);
  }

  async getSession(name: string): Promise<SavedChat | null> {
    const chats = this.getStore().get('chats');
    if (!Object.hasOwn(chats, name)) return null;
    return validateInput(SavedChatSchema, chats[name], `saved chat '${name}'`);
  }

  async saveSession(
    name: string,
    provider: ProviderName,
    model: string,
    turns: readonly Turn[],
  ): Promise<SavedChat> {
    const store = this.getStore();
    const chats = store.get('chats');
    const existing = SavedChatSchema.safeParse(Object.hasOwn(chats, name) ? chats[name] : undefined);
    const now = new Date().toISOString();

    const chat: SavedChat = {
      name,
      provider,
      model,
      turns: [...turns],
      createdAt: existing.success ? existing.data.createdAt : now,
      updatedAt: now,
    };
    // A computed key always defines an own property, whatever the name
    store.set('chats', { ...chats, [name]: chat });
    return chat;
  }

  /** Valid entries only, most recently updated first. */
  async listSessions(): Promise<SavedChatSummary[]> {
    const summaries: SavedChatSummary[] = [];
    for (const value of Object.values(this.getStore().get('chats'))) {
      const parsed = SavedChatSchema.safeParse(value);
      if (!parsed.success) continue;
      const { name, provider, model, turns, updatedAt } = parsed.data;
      summaries.push({ name, provider, model, turnCount: turns.length, updatedAt });
    }
    return summaries.sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }
}
