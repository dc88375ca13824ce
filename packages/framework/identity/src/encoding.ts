import tweetnacl_util from "tweetnacl-util";
const { encodeBase64, decodeBase64, encodeUTF8, decodeUTF8 } = tweetnacl_util;

/** Encode a Uint8Array to a base64 string */
export function toBase64(data: Uint8Array): string {
  return encodeBase64(data);
}

/** Decode a base64 string to a Uint8Array */
export function fromBase64(base64: string): Uint8Array {
  return decodeBase64(base64);
}

/** Encode bytes as padded URL-safe base64 (`-` and `_` alphabet) */
export function toBase64Url(data: Uint8Array): string {
  return encodeBase64(data).replace(/\+/g, "-").replace(/\//g, "_");
}

/**
 * Decode URL-safe base64, padded or not.
 * Throws on characters outside the URL-safe alphabet.
 */
export function fromBase64Url(text: string): Uint8Array {
  const trimmed = text.trim();
  if (!/^[A-Za-z0-9_-]*={0,2}$/.test(trimmed)) {
    throw new Error("Invalid base64url encoding");
  }
  const unpadded = trimmed.replace(/=+$/, "");
  const padded = unpadded + "=".repeat((4 - (unpadded.length % 4)) % 4);
  return decodeBase64(padded.replace(/-/g, "+").replace(/_/g, "/"));
}

export function utf8Encode(text: string): Uint8Array {
  return decodeUTF8(text);
}

export function utf8Decode(data: Uint8Array): string {
  return encodeUTF8(data);
}
