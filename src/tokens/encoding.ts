const BASE64URL = /^[A-Za-z0-9_-]*$/;

/** Unpadded base64url, safe inside URLs, headers and HTML attributes. */
export function encodeToken(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64url');
}

export function decodeToken(token: string): Buffer {
  if (!BASE64URL.test(token)) {
    throw new TypeError('Token contains characters outside the base64url alphabet');
  }
  return Buffer.from(token, 'base64url');
}
