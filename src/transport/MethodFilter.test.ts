import { describe, it, expect } from 'vitest';
import { isMethodAllowed } from './MethodFilter.js';

describe('isMethodAllowed', () => {
  it('allows everything without a filter', () => {
    expect(isMethodAllowed(undefined, 'eth_sendRawTransaction')).toBe(true);
    expect(isMethodAllowed({}, 'eth_sendRawTransaction')).toBe(true);
  });

  it('restricts to the include list when it is non-empty', () => {
    const filter = { include: ['eth_call', 'eth_chainId'] };
    expect(isMethodAllowed(filter, 'eth_call')).toBe(true);
    expect(isMethodAllowed(filter, 'eth_getLogs')).toBe(false);
  });

  it('treats an empty include list as allow-all', () => {
    expect(isMethodAllowed({ include: [], exclude: ['eth_sign'] }, 'eth_getLogs')).toBe(true);
  });

  it('lets exclude win over include', () => {
    const filter = { include: ['eth_call'], exclude: ['eth_call'] };
    expect(isMethodAllowed(filter, 'eth_call')).toBe(false);
  });
});
