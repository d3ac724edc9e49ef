/**
 * CredentialVault Service
 * Provider API keys at rest, AES-256-GCM encrypted with a machine-derived key
 */

import crypto from 'crypto';
import os from 'os';
import Conf from 'conf';
import { PROJECT_NAME } from '../../../shared/constants';
import type { ProviderName } from '../../../shared/types';
import { isProviderName } from '../../../shared/types';
import { createLogger } from '../../utils/logger';
import type { StoreOptions } from '../storage/SettingsStore';

const log = createLogger('CredentialVault');

/** Prefix written before AES-256-GCM encrypted values. */
const ENC_AES_PREFIX = 'enc:aes:';

type CredentialStoreSchema = {
  apiKeys: Record<string, string>;
};

export type Credentials = Partial<Record<ProviderName, string>>;

export class CredentialVault {
  private store: Conf<CredentialStoreSchema> | null = null;

  constructor(private readonly options: StoreOptions = {}) {}

  private init(): Conf<CredentialStoreSchema> {
    if (!this.store) {
      this.store = new Conf<CredentialStoreSchema>({
        projectName: PROJECT_NAME,
        configName: 'credentials',
        cwd: this.options.cwd,
        defaults: { apiKeys: {} },
      });
    }
    return this.store;
  }

  private readAll(): Record<string, string> {
    return { ...this.init().get('apiKeys') };
  }

  async saveApiKey(provider: ProviderName, apiKey: string): Promise<void> {
    const apiKeys = this.readAll();
    apiKeys[provider] = this.encrypt(apiKey);
    this.init().set('apiKeys', apiKeys);
  }

  async getApiKey(provider: ProviderName): Promise<string | null> {
    const stored = this.readAll()[provider];
    if (!stored) return null;

    const decrypted = this.decrypt(stored);

    // A key pasted into the file by hand is re-written encrypted on first read.
    if (decrypted && !stored.startsWith(ENC_AES_PREFIX)) {
      await this.saveApiKey(provider, decrypted);
    }

    return decrypted;
  }

  /** Every stored key that decrypts. */
  async getAllApiKeys(): Promise<Credentials> {
    const out: Credentials = {};
    for (const provider of Object.keys(this.readAll())) {
      if (!isProviderName(provider)) continue;
      const apiKey = await this.getApiKey(provider);
      if (apiKey) out[provider] = apiKey;
    }
    return out;
  }

  /** Returns false when no key was stored for the provider. */
  async deleteApiKey(provider: ProviderName): Promise<boolean> {
    const apiKeys = this.readAll();
    if (!(provider in apiKeys)) return false;
    delete apiKeys[provider];
    this.init().set('apiKeys', apiKeys);
    return true;
  }

  // ── Key derivation ─────────────────────────────────────────────────────────

  /**
   * Stable, machine-specific 256-bit key derived from the host name and the
   * user's home directory.
   */
  private getEncryptionKey(): Buffer {
    const machineId =
      process.env.COMPUTERNAME ||
      process.env.HOSTNAME ||
      os.hostname() ||
      'parley-unknown-host';
    return crypto.scryptSync(`${machineId}:${os.homedir()}`, 'parley-apikey-salt-v1', 32);
  }

  private encrypt(apiKey: string): string {
    const key = this.getEncryptionKey();
    const iv = crypto.randomBytes(16);
    const cipher = crypto.createCipheriv('aes-256-gcm', key, iv);

    const encrypted = Buffer.concat([
      cipher.update(apiKey, 'utf8'),
      cipher.final(),
    ]);

    const authTag = cipher.getAuthTag();

    // Format: enc:aes:iv:authTag:encrypted (all base64)
    return (
      ENC_AES_PREFIX +
      `${iv.toString('base64')}:${authTag.toString('base64')}:${encrypted.toString('base64')}`
    );
  }

  private decrypt(stored: string): string | null {
    if (!stored.startsWith(ENC_AES_PREFIX)) {
      return stored;
    }
    try {
      const [ivB64, authTagB64, encryptedB64] = stored.slice(ENC_AES_PREFIX.length).split(':');

      if (!ivB64 || !authTagB64 || !encryptedB64) {
        return null;
      }

      const decipher = crypto.createDecipheriv(
        'aes-256-gcm',
        this.getEncryptionKey(),
        Buffer.from(ivB64, 'base64'),
      );
      decipher.setAuthTag(Buffer.from(authTagB64, 'base64'));

      const decrypted = Buffer.concat([
        decipher.update(Buffer.from(encryptedB64, 'base64')),
        decipher.final(),
      ]);

      return decrypted.toString('utf8');
    } catch (error) {
      // Written on another machine, or tampered with
      log.error('Failed to decrypt API key:', error instanceof Error ? error.message : String(error));
      return null;
    }
  }
}
