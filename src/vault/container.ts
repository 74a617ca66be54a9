/**
 * Vault container codec.
 *
 * On-disk layout (UTF-8 JSON, binary fields base64):
 *
 * ```
 * {
 *   "format": "otp-vault",
 *   "version": 1,
 *   "kdf": { "algorithm": "argon2id", "version": 19, "salt", "timeCost", "memoryCost", "parallelism" },
 *   "cipher": { "algorithm": "chacha20-poly1305", "nonce" },
 *   "ciphertext"
 * }
 * ```
 *
 * The ciphertext wraps a versioned payload `{ version: 1, entries: [...] }`.
 * Header identity is bound into the AEAD tag as associated data.
 */

import { z } from 'zod';
import { createSecretEntry } from './entry';
import { sealWithFreshNonce, open, NONCE_LENGTH, TAG_LENGTH } from './encryption';
import { FormatError, InvalidEntryError } from './errors';
import { MAX_MEMORY_COST, MAX_PARALLELISM, MAX_TIME_COST, MIN_SALT_LENGTH } from './key-derivation';
import { wipe } from './sensitive';
import type { SecretEntry, StoredKdfParams, VaultContainer, VaultEntries } from './types';

export const CONTAINER_FORMAT = 'otp-vault';
export const CONTAINER_VERSION = 1;
export const PAYLOAD_VERSION = 1;

const CIPHER_ALGORITHM = 'chacha20-poly1305';

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

const base64Bytes = z
  .string()
  .regex(BASE64_PATTERN, 'must be base64')
  .transform((text) => new Uint8Array(Buffer.from(text, 'base64')));

const HeaderSchema = z.object({
  format: z.literal(CONTAINER_FORMAT),
  version: z.number().int(),
});

const ContainerSchema = z.object({
  format: z.literal(CONTAINER_FORMAT),
  version: z.literal(CONTAINER_VERSION),
  kdf: z
    .object({
      algorithm: z.literal('argon2id'),
      version: z.literal(19),
      salt: base64Bytes.refine((salt) => salt.length >= MIN_SALT_LENGTH, `salt must be at least ${MIN_SALT_LENGTH} bytes`),
      timeCost: z.number().int().min(1).max(MAX_TIME_COST),
      memoryCost: z.number().int().max(MAX_MEMORY_COST),
      parallelism: z.number().int().min(1).max(MAX_PARALLELISM),
    })
    .refine((kdf) => kdf.memoryCost >= 8 * kdf.parallelism, 'memoryCost must be at least 8 * parallelism'),
  cipher: z.object({
    algorithm: z.literal(CIPHER_ALGORITHM),
    nonce: base64Bytes.refine((nonce) => nonce.length === NONCE_LENGTH, `nonce must be ${NONCE_LENGTH} bytes`),
  }),
  ciphertext: base64Bytes.refine((data) => data.length >= TAG_LENGTH, 'ciphertext shorter than the tag'),
});

const PayloadSchema = z.object({
  version: z.literal(PAYLOAD_VERSION),
  entries: z.array(
    z.object({
      name: z.string(),
      secret: base64Bytes,
      algorithm: z.enum(['SHA1', 'SHA256', 'SHA512']),
      digits: z.number(),
      period: z.number(),
      t0: z.number(),
    })
  ),
});

/** Associated data binding the header identity into the tag. */
export function associatedData(kdf: Pick<StoredKdfParams, 'algorithm' | 'version'>): Uint8Array {
  return new TextEncoder().encode(
    `${CONTAINER_FORMAT}/${CONTAINER_VERSION}/${kdf.algorithm}/${kdf.version}/${CIPHER_ALGORITHM}`
  );
}

function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function parseJson(bytes: Uint8Array, what: string): unknown {
  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (error) {
    throw new FormatError(`${what} is not valid UTF-8`, error);
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new FormatError(`${what} is not valid JSON`, error);
  }
}

/**
 * Serialize a container to file bytes.
 */
export function encodeContainer(container: VaultContainer): Uint8Array {
  const { kdf } = container;
  const document = {
    format: CONTAINER_FORMAT,
    version: container.version,
    kdf: {
      algorithm: kdf.algorithm,
      version: kdf.version,
      salt: toBase64(kdf.salt),
      timeCost: kdf.timeCost,
      memoryCost: kdf.memoryCost,
      parallelism: kdf.parallelism,
    },
    cipher: { algorithm: CIPHER_ALGORITHM, nonce: toBase64(container.nonce) },
    ciphertext: toBase64(container.ciphertext),
  };
  return new TextEncoder().encode(JSON.stringify(document, null, 2) + '\n');
}

/**
 * Parse file bytes into a container.
 *
 * Unknown versions fail before any other field is looked at.
 *
 * @throws FormatError on unreadable, truncated or unknown-version input
 */
export function decodeContainer(bytes: Uint8Array): VaultContainer {
  const raw = parseJson(bytes, 'container');

  const header = HeaderSchema.safeParse(raw);
  if (!header.success) {
    throw new FormatError(`not an ${CONTAINER_FORMAT} container: ${describeIssues(header.error)}`);
  }
  if (header.data.version !== CONTAINER_VERSION) {
    throw new FormatError(`unsupported container version ${header.data.version}`);
  }

  const parsed = ContainerSchema.safeParse(raw);
  if (!parsed.success) {
    throw new FormatError(`malformed container: ${describeIssues(parsed.error)}`);
  }

  const { kdf, cipher, ciphertext } = parsed.data;
  return { version: parsed.data.version, kdf, nonce: cipher.nonce, ciphertext };
}

/**
 * Serialize entries into the versioned payload, sorted by name.
 */
export function encodePayload(entries: Iterable<SecretEntry>): Uint8Array {
  const sorted = [...entries].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  const payload = {
    version: PAYLOAD_VERSION,
    entries: sorted.map((entry) => ({
      name: entry.name,
      secret: toBase64(entry.secret),
      algorithm: entry.algorithm,
      digits: entry.digits,
      period: entry.period,
      t0: entry.t0,
    })),
  };
  return new TextEncoder().encode(JSON.stringify(payload));
}

/**
 * Parse a decrypted payload back into entries, re-validating each one.
 *
 * @throws FormatError if the payload shape is wrong, an entry is invalid or a name repeats
 */
export function decodePayload(bytes: Uint8Array): VaultEntries {
  const parsed = PayloadSchema.safeParse(parseJson(bytes, 'payload'));
  if (!parsed.success) {
    throw new FormatError(`malformed payload: ${describeIssues(parsed.error)}`);
  }

  const entries: VaultEntries = new Map();
  for (const raw of parsed.data.entries) {
    let entry: SecretEntry;
    try {
      entry = createSecretEntry({ ...raw, encoded: false });
    } catch (error) {
      if (error instanceof InvalidEntryError) {
        throw new FormatError(`invalid entry in payload: ${error.message}`, error);
      }
      throw error;
    } finally {
      wipe(raw.secret);
    }
    if (entries.has(entry.name)) {
      throw new FormatError(`duplicate entry in payload: ${entry.name}`);
    }
    entries.set(entry.name, entry);
  }
  return entries;
}

/**
 * Encrypt entries into a container under `key`, with a fresh nonce.
 */
export function sealEntries(entries: Iterable<SecretEntry>, key: Uint8Array, kdf: StoredKdfParams): VaultContainer {
  const plaintext = encodePayload(entries);
  try {
    const { nonce, ciphertext } = sealWithFreshNonce(key, plaintext, associatedData(kdf));
    return { version: CONTAINER_VERSION, kdf, nonce, ciphertext };
  } finally {
    wipe(plaintext);
  }
}

/**
 * Decrypt a container's entries with `key`.
 *
 * @throws IntegrityError if the tag does not verify
 * @throws FormatError if the authenticated payload is malformed
 */
export function openEntries(container: VaultContainer, key: Uint8Array): VaultEntries {
  const plaintext = open(key, container.nonce, container.ciphertext, associatedData(container.kdf));
  try {
    return decodePayload(plaintext);
  } finally {
    wipe(plaintext);
  }
}
