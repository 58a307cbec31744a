import { describe, it, expect } from 'vitest';
import { parseKey } from './terminal';

describe('parseKey', () => {
  it('maps CSI and SS3 arrow sequences', () => {
    expect(parseKey('\x1b[A')).toBe('ArrowUp');
    expect(parseKey('\x1b[B')).toBe('ArrowDown');
    expect(parseKey('\x1bOC')).toBe('ArrowRight');
    expect(parseKey('\x1bOD')).toBe('ArrowLeft');
  });

  it('treats a bare ESC and Ctrl-C as Escape', () => {
    expect(parseKey('\x1b')).toBe('Escape');
    expect(parseKey('\x03')).toBe('Escape');
  });

  it('names control keys', () => {
    expect(parseKey('\r')).toBe('Enter');
    expect(parseKey('\x7f')).toBe('Backspace');
    expect(parseKey('\t')).toBe('Tab');
  });

  it('passes printable characters through', () => {
    expect(parseKey('h')).toBe('h');
    expect(parseKey(' ')).toBe(' ');
    expect(parseKey('I')).toBe('I');
  });
});
