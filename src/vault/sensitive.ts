/**
 * Scoped handling of sensitive buffers.
 *
 * Passwords, derived keys and serialized plaintext live in Uint8Arrays that
 * are zeroed as soon as the scope that acquired them exits, on success or throw.
 */

const encoder = new TextEncoder();

/** Overwrite buffers with zeros. */
export function wipe(...buffers: Array<Uint8Array | null | undefined>): void {
  for (const buffer of buffers) {
    buffer?.fill(0);
  }
}

/**
 * Run `fn` with the given buffer and wipe it afterwards.
 *
 * @example
 * const key = withWiped(encodePassword(password), (bytes) => derive(bytes));
 */
export function withWiped<T>(buffer: Uint8Array, fn: (buffer: Uint8Array) => T): T {
  try {
    return fn(buffer);
  } finally {
    wipe(buffer);
  }
}

/** UTF-8 encode a password into a fresh buffer the caller is responsible for wiping. */
export function encodePassword(password: string): Uint8Array {
  return encoder.encode(password);
}
