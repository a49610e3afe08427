// INPUT: node:crypto (webcrypto), types (Note)
// OUTPUT: DecryptionError, encrypt, decrypt, encryptNote, decryptNote, DEFAULT_ITERATIONS
// POS: Password-based encryption of note fields (PBKDF2 → AES-GCM)

import { webcrypto } from "node:crypto";
import type { Note } from "./types";

const { subtle } = webcrypto;

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export const DEFAULT_ITERATIONS = 200000;
// Upper bound accepted from a ciphertext header
const MAX_ITERATIONS = 10_000_000;

export class DecryptionError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "DecryptionError";
  }
}

const base64Encode = (bytes: Uint8Array) => {
  let binary = "";
  bytes.forEach((b) => {
    binary += String.fromCharCode(b);
  });
  return btoa(binary);
};

const base64Decode = (value: string) => {
  const binary = atob(value);
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i += 1) {
    bytes[i] = binary.charCodeAt(i);
  }
  return bytes;
};

const deriveKey = async (password: string, salt: Uint8Array, iterations: number) => {
  const baseKey = await subtle.importKey("raw", encoder.encode(password), "PBKDF2", false, [
    "deriveKey",
  ]);
  return subtle.deriveKey(
    {
      name: "PBKDF2",
      salt,
      iterations,
      hash: "SHA-256",
    },
    baseKey,
    { name: "AES-GCM", length: 256 },
    false,
    ["encrypt", "decrypt"],
  );
};

/**
 * Encrypts `plaintext` with a key derived from `password`.
 *
 * The result is `iterations.salt.iv.cipher`, each binary part in base64,
 * so it can be stored in place of the plain field.
 */
export const encrypt = async (
  password: string,
  plaintext: string,
  iterations = DEFAULT_ITERATIONS,
): Promise<string> => {
  const salt = webcrypto.getRandomValues(new Uint8Array(16));
  const iv = webcrypto.getRandomValues(new Uint8Array(12));
  const key = await deriveKey(password, salt, iterations);
  const encrypted = await subtle.encrypt({ name: "AES-GCM", iv }, key, encoder.encode(plaintext));
  return [String(iterations), base64Encode(salt), base64Encode(iv), base64Encode(new Uint8Array(encrypted))].join(
    ".",
  );
};

export const decrypt = async (password: string, ciphertext: string): Promise<string> => {
  const parts = ciphertext.split(".");
  const iterations = Number(parts[0]);
  if (parts.length !== 4 || !Number.isInteger(iterations) || iterations <= 0 || iterations > MAX_ITERATIONS) {
    throw new DecryptionError("Ciphertext is malformed");
  }

  let salt: Uint8Array;
  let iv: Uint8Array;
  let cipher: Uint8Array;
  try {
    salt = base64Decode(parts[1]);
    iv = base64Decode(parts[2]);
    cipher = base64Decode(parts[3]);
  } catch (err) {
    throw new DecryptionError("Ciphertext is malformed", err);
  }

  try {
    const key = await deriveKey(password, salt, iterations);
    const decrypted = await subtle.decrypt({ name: "AES-GCM", iv }, key, cipher);
    return decoder.decode(decrypted);
  } catch (err) {
    // AES-GCM authentication fails the same way for a wrong password and for tampered data
    throw new DecryptionError("Wrong password or corrupted data", err);
  }
};

/** Copy of `note` with its title (when not empty) and content encrypted. */
export async function encryptNote(note: Note, password: string): Promise<Note> {
  return {
    ...note,
    title: note.title ? await encrypt(password, note.title) : "",
    content: await encrypt(password, note.content),
  };
}

export async function decryptNote(note: Note, password: string): Promise<Note> {
  return {
    ...note,
    title: note.title ? await decrypt(password, note.title) : "",
    content: await decrypt(password, note.content),
  };
}
