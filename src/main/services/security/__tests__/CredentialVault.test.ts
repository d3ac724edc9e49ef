import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CredentialVault } from '../CredentialVault';

let dir: string;

function credentialsFile(): string {
  return path.join(dir, 'credentials.json');
}

function writeKeys(apiKeys: Record<string, string>): void {
  fs.writeFileSync(credentialsFile(), JSON.stringify({ apiKeys }));
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'parley-vault-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('CredentialVault', () => {
  it('stores keys encrypted and reads them back', async () => {
    const vault = new CredentialVault({ cwd: dir });

    await vault.saveApiKey('openai', 'test-secret-openai');

    const raw = fs.readFileSync(credentialsFile(), 'utf8');
    expect(raw).not.toContain('test-secret-openai');
    expect(raw).toContain('"openai": "enc:aes:');
    await expect(vault.getApiKey('openai')).resolves.toBe('test-secret-openai');
    await expect(new CredentialVault({ cwd: dir }).getApiKey('openai')).resolves.toBe('test-secret-openai');
  });

  it('encrypts a hand-written key on first read', async () => {
    writeKeys({ mistral: 'test-secret-mistral' });
    const vault = new CredentialVault({ cwd: dir });

    await expect(vault.getApiKey('mistral')).resolves.toBe('test-secret-mistral');
    expect(fs.readFileSync(credentialsFile(), 'utf8')).not.toContain('test-secret-mistral');
    await expect(vault.getApiKey('mistral')).resolves.toBe('test-secret-mistral');
  });

  it('returns null for a value that does not decrypt', async () => {
    writeKeys({ openai: 'enc:aes:AAAA:BBBB:CCCC' });

    await expect(new CredentialVault({ cwd: dir }).getApiKey('openai')).resolves.toBeNull();
  });

  it('lists provider keys only', async () => {
    writeKeys({ cohere: 'test-secret', google: 'test-secret-google' });

    await expect(new CredentialVault({ cwd: dir }).getAllApiKeys()).resolves.toEqual({ google: 'test-secret-google' });
  });

  it('deletes a key and reports whether one was stored', async () => {
    const vault = new CredentialVault({ cwd: dir });
    await vault.saveApiKey('anthropic', 'test-secret-anthropic');

    await expect(vault.deleteApiKey('anthropic')).resolves.toBe(true);
    await expect(vault.deleteApiKey('anthropic')).resolves.toBe(false);
    await expect(vault.getApiKey('anthropic')).resolves.toBeNull();
  });
});
