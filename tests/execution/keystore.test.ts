import { existsSync, mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { ethers } from 'ethers';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { parseConfig } from '../../src/core/config.js';
import { ConfigError } from '../../src/core/errors.js';
import {
  KeystoreError,
  decryptPrivateKey,
  encryptPrivateKey,
  loadKeystore,
  parseKeystore,
} from '../../src/execution/wallet/keystore.js';
import { importPrivateKey, loadWallet, resolveKeystorePath } from '../../src/execution/wallet/manager.js';

const PASSWORD = 'test-secret';

let dir: string;
let wallet: ethers.Wallet;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'marketpilot-keystore-'));
  wallet = ethers.Wallet.createRandom();
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('keystore', () => {
  it('decrypts what it encrypted', () => {
    const store = encryptPrivateKey(wallet.privateKey, PASSWORD, wallet.address);
    expect(store).toMatchObject({ version: 1, cipher: 'aes-256-gcm', kdf: 'scrypt', address: wallet.address });
    expect(decryptPrivateKey(store, PASSWORD)).toBe(wallet.privateKey);
  });

  it('refuses an empty password', () => {
    expect(() => encryptPrivateKey(wallet.privateKey, '', wallet.address)).toThrow(
      'Keystore password must not be empty'
    );
  });

  it('fails on the wrong password', () => {
    const store = encryptPrivateKey(wallet.privateKey, PASSWORD, wallet.address);
    expect(() => decryptPrivateKey(store, 'wrong-secret')).toThrow(KeystoreError);
  });

  it('names the fields that fail validation', () => {
    expect(() => parseKeystore({ version: 1, cipher: 'aes-256-gcm', kdf: 'scrypt' })).toThrow(
      /Invalid keystore: salt: Required/
    );
  });

  it('reports missing and unparseable files as config errors', () => {
    expect(() => loadKeystore(join(dir, 'missing.json'))).toThrow(ConfigError);
    const path = join(dir, 'broken.json');
    writeFileSync(path, '{');
    expect(() => loadKeystore(path)).toThrow(`Keystore ${path} is not valid JSON`);
  });
});

describe('wallet manager', () => {
  it('imports a key into an owner-only keystore', () => {
    const path = join(dir, 'nested', 'keystore.json');
    expect(importPrivateKey(wallet.privateKey, PASSWORD, path)).toBe(wallet.address);
    expect(statSync(path).mode & 0o777).toBe(0o600);
    expect(JSON.parse(readFileSync(path, 'utf8'))).toMatchObject({ address: wallet.address });
  });

  it('loads the wallet from the keystore with the password from env', () => {
    const path = join(dir, 'keystore.json');
    importPrivateKey(wallet.privateKey, PASSWORD, path);
    const config = parseConfig({ wallet: { keystorePath: path } });

    const loaded = loadWallet(config, { MARKETPILOT_KEYSTORE_PASSWORD: PASSWORD });
    expect(loaded.address).toBe(wallet.address);
  });

  it('prefers a raw key from env', () => {
    const path = join(dir, 'keystore.json');
    const config = parseConfig({ wallet: { keystorePath: path } });
    expect(loadWallet(config, { MARKETPILOT_PRIVATE_KEY: wallet.privateKey }).address).toBe(wallet.address);
    expect(existsSync(path)).toBe(false);
  });

  it('seals a raw key into a missing keystore when a password is set', () => {
    const path = join(dir, 'sealed', 'keystore.json');
    const config = parseConfig({ wallet: { keystorePath: path } });

    loadWallet(config, { MARKETPILOT_PRIVATE_KEY: wallet.privateKey, MARKETPILOT_KEYSTORE_PASSWORD: PASSWORD });

    expect(statSync(path).mode & 0o777).toBe(0o600);
    expect(loadWallet(config, { MARKETPILOT_KEYSTORE_PASSWORD: PASSWORD }).address).toBe(wallet.address);
  });

  it('leaves an existing keystore untouched', () => {
    const path = join(dir, 'keystore.json');
    importPrivateKey(wallet.privateKey, PASSWORD, path);
    const before = readFileSync(path, 'utf8');
    const other = ethers.Wallet.createRandom();

    const loaded = loadWallet(parseConfig({ wallet: { keystorePath: path } }), {
      MARKETPILOT_PRIVATE_KEY: other.privateKey,
      MARKETPILOT_KEYSTORE_PASSWORD: PASSWORD,
    });

    expect(loaded.address).toBe(other.address);
    expect(readFileSync(path, 'utf8')).toBe(before);
  });

  it('needs a key or a password', () => {
    expect(() => loadWallet(parseConfig({}), {})).toThrow(
      'Live execution needs MARKETPILOT_PRIVATE_KEY or MARKETPILOT_KEYSTORE_PASSWORD'
    );
  });

  it('resolves the keystore path from config, then env', () => {
    expect(resolveKeystorePath(parseConfig({ wallet: { keystorePath: '/tmp/a.json' } }), {})).toBe('/tmp/a.json');
    expect(resolveKeystorePath(parseConfig({}), { MARKETPILOT_KEYSTORE_PATH: '/tmp/b.json' })).toBe('/tmp/b.json');
  });
});
