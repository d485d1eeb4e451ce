import { existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import { ethers } from 'ethers';

import type { MarketPilotConfig } from '../../core/config.js';
import { ConfigError } from '../../core/errors.js';
import { decryptPrivateKey, encryptPrivateKey, loadKeystore, saveKeystore } from './keystore.js';

export function resolveKeystorePath(
  config: MarketPilotConfig,
  env: NodeJS.ProcessEnv = process.env
): string {
  return (
    config.wallet.keystorePath ??
    env.MARKETPILOT_KEYSTORE_PATH ??
    join(homedir(), '.marketpilot', 'keystore.json')
  );
}

/**
 * Signer for CLOB orders. A raw key in MARKETPILOT_PRIVATE_KEY wins, and is
 * sealed into a missing keystore when MARKETPILOT_KEYSTORE_PASSWORD is also
 * set; otherwise the keystore is decrypted with that password. No provider is
 * attached: the CLOB only needs signatures.
 */
export function loadWallet(
  config: MarketPilotConfig,
  env: NodeJS.ProcessEnv = process.env
): ethers.Wallet {
  const rawKey = env.MARKETPILOT_PRIVATE_KEY?.trim();
  const password = env.MARKETPILOT_KEYSTORE_PASSWORD;
  if (rawKey) {
    const wallet = new ethers.Wallet(rawKey);
    const path = resolveKeystorePath(config, env);
    if (password && !existsSync(path)) {
      importPrivateKey(wallet.privateKey, password, path);
    }
    return wallet;
  }
  if (!password) {
    throw new ConfigError(
      'Live execution needs MARKETPILOT_PRIVATE_KEY or MARKETPILOT_KEYSTORE_PASSWORD'
    );
  }
  const store = loadKeystore(resolveKeystorePath(config, env));
  const wallet = new ethers.Wallet(decryptPrivateKey(store, password));
  if (wallet.address.toLowerCase() !== store.address.toLowerCase()) {
    throw new ConfigError(
      `Keystore address ${store.address} does not match decrypted key ${wallet.address}`
    );
  }
  return wallet;
}

/** Encrypt an existing key into a keystore file and return its address. */
export function importPrivateKey(
  privateKey: string,
  password: string,
  path: string
): string {
  const wallet = new ethers.Wallet(privateKey);
  saveKeystore(path, encryptPrivateKey(wallet.privateKey, password, wallet.address));
  return wallet.address;
}
