/**
 * @fileoverview Tests for printer command encoding
 */

import { describe, it, expect } from '@jest/globals';
import { encodeRequest, getCommandMnemonic, HANDSHAKE_REQUEST } from './command-encoder';

describe('command-encoder', () => {
  it('should terminate every command with CRLF', () => {
    expect(encodeRequest({ kind: 'status' })).toBe('~M119\r\n');
    expect(encodeRequest({ kind: 'progress' })).toBe('~M27\r\n');
  });

  it('should map each query kind to its mnemonic', () => {
    expect(getCommandMnemonic({ kind: 'control' })).toBe('~M601 S1');
    expect(getCommandMnemonic({ kind: 'info' })).toBe('~M115');
    expect(getCommandMnemonic({ kind: 'head-position' })).toBe('~M114');
    expect(getCommandMnemonic({ kind: 'temperature' })).toBe('~M105');
  });

  it('should substitute set-temperature parameters', () => {
    expect(encodeRequest({ kind: 'set-temperature', toolIndex: 1, temperature: 215 }))
      .toBe('~M104 S215 T1\r\n');
  });

  it('should use the control command as handshake', () => {
    expect(encodeRequest(HANDSHAKE_REQUEST)).toBe('~M601 S1\r\n');
  });
});
