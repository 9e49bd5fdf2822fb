import { describe, it, expect } from 'vitest';
import { encodeToken, decodeToken } from '../../src/tokens/index.js';

describe('token encoding', () => {
  it('uses the url-safe alphabet without padding', () => {
    // 0xfb 0xff is "+/8=" in standard base64
    expect(encodeToken(Uint8Array.from([0xfb, 0xff]))).toBe('-_8');
  });

  it('encodes a single byte in two characters', () => {
    expect(encodeToken(Uint8Array.from([0x01]))).toBe('AQ');
  });

  it('decodes back to the original bytes', () => {
    expect([...decodeToken('-_8')]).toEqual([0xfb, 0xff]);
  });

  it('rejects characters outside base64url', () => {
    expect(() => decodeToken('ab+c')).toThrow(TypeError);
    expect(() => decodeToken('abc=')).toThrow(TypeError);
  });
});
