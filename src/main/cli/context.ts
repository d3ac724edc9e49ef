import type { AppSettings, ProviderName } from '../../shared/types';
import type { Output } from '../../renderer/TerminalRenderer';
import type { ProviderFactory } from '../services/ai/ProviderRegistry';
import type { LineReader } from '../services/chat/LineReader';
import type { ChatArchive } from '../services/chat/SessionLoop';
import type { CredentialSource } from '../services/config/RuntimeConfig';

export interface SettingsSource {
  getSettings(): Promise<AppSettings>;
}

export interface CredentialStore extends CredentialSource {
  saveApiKey(provider: ProviderName, apiKey: string): Promise<void>;
  deleteApiKey(provider: ProviderName): Promise<boolean>;
}

/** Everything a command handler touches outside its own arguments */
export interface CliContext {
  env: NodeJS.ProcessEnv;
  stdout: Output;
  settings: SettingsSource;
  credentials: CredentialStore;
  sessions: ChatArchive;
  createReader(): LineReader;
  /** Adapter constructors; replaced in tests */
  factories?: Readonly<Record<ProviderName, ProviderFactory>>;
}
