import { createCipheriv, createDecipheriv, randomBytes, scryptSync } from 'node:crypto';
import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

import { z } from 'zod';

import { ConfigError } from '../../core/errors.js';

const SALT_BYTES = 16;
const IV_BYTES = 12;
const KEY_BYTES = 32;

const keystoreSchema = z.object({
  version: z.literal(1),
  cipher: z.literal('aes-256-gcm'),
  kdf: z.literal('scrypt'),
  salt: z.string().min(1),
  iv: z.string().min(1),
  tag: z.string().min(1),
  ciphertext: z.string().min(1),
  address: z.string().regex(/^0x[0-9a-fA-F]{40}$/, 'expected a 0x-prefixed address'),
});

export type EncryptedKeystore = z.infer<typeof keystoreSchema>;

export class KeystoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'KeystoreError';
  }
}

function deriveKey(password: string, salt: Buffer): Buffer {
  return scryptSync(password, salt, KEY_BYTES);
}

export function encryptPrivateKey(
  privateKey: string,
  password: string,
  address: string
): EncryptedKeystore {
  if (!password) {
    throw new KeystoreError('Keystore password must not be empty');
  }
  const salt = randomBytes(SALT_BYTES);
  const iv = randomBytes(IV_BYTES);
  const cipher = createCipheriv('aes-256-gcm', deriveKey(password, salt), iv);
  const ciphertext = Buffer.concat([cipher.update(privateKey, 'utf8'), cipher.final()]);

  return keystoreSchema.parse({
    version: 1,
    cipher: 'aes-256-gcm',
    kdf: 'scrypt',
    salt: salt.toString('base64'),
    iv: iv.toString('base64'),
    tag: cipher.getAuthTag().toString('base64'),
    ciphertext: ciphertext.toString('base64'),
    address,
  });
}

/** Throws KeystoreError on a wrong password or tampered file (GCM tag mismatch). */
export function decryptPrivateKey(store: EncryptedKeystore, password: string): string {
  const decipher = createDecipheriv(
    'aes-256-gcm',
    deriveKey(password, Buffer.from(store.salt, 'base64')),
    Buffer.from(store.iv, 'base64')
  );
  decipher.setAuthTag(Buffer.from(store.tag, 'base64'));
  try {
    const plaintext = Buffer.concat([
      decipher.update(Buffer.from(store.ciphertext, 'base64')),
      decipher.final(),
    ]);
    return plaintext.toString('utf8');
  } catch (err) {
    throw new KeystoreError(`Could not decrypt keystore for ${store.address}`, { cause: err });
  }
}

export function parseKeystore(raw: unknown): EncryptedKeystore {
  const parsed = keystoreSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid keystore: ${details}`);
  }
  return parsed.data;
}

export function saveKeystore(path: string, store: EncryptedKeystore): void {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  const tmp = `${path}.tmp`;
  writeFileSync(tmp, JSON.stringify(store, null, 2), { encoding: 'utf8', mode: 0o600 });
  renameSync(tmp, path);
}

export function loadKeystore(path: string): EncryptedKeystore {
  if (!existsSync(path)) {
    throw new ConfigError(`Keystore not found: ${path}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    throw new ConfigError(`Keystore ${path} is not valid JSON`, { cause: err });
  }
  return parseKeystore(raw);
}
