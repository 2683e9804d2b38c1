import { describe, expect, it } from 'vitest';
import { findUrlPolicyViolation } from '../urlPolicy';

const strict = { blockPrivateHosts: true };

describe('findUrlPolicyViolation', () => {
  it('allows public web URLs', () => {
    expect(findUrlPolicyViolation('https://site.test/page', strict)).toBeNull();
    expect(findUrlPolicyViolation('http://172.32.0.1/', strict)).toBeNull();
    expect(findUrlPolicyViolation('http://[::ffff:8.8.8.8]/', strict)).toBeNull();
  });

  it('rejects invalid URLs and other protocols', () => {
    expect(findUrlPolicyViolation('not a url', strict)).toBe('invalid URL');
    expect(findUrlPolicyViolation('ftp://site.test/file', strict)).toBe('unsupported protocol ftp:');
    expect(findUrlPolicyViolation('file:///etc/passwd', { blockPrivateHosts: false })).toBe('unsupported protocol file:');
  });

  it('rejects local hostnames', () => {
    expect(findUrlPolicyViolation('http://localhost:3000/', strict)).toBe('blocked hostname localhost');
    expect(findUrlPolicyViolation('http://printer.local/', strict)).toBe('blocked hostname printer.local');
  });

  it('rejects private and loopback addresses', () => {
    expect(findUrlPolicyViolation('http://10.0.0.5/', strict)).toBe('blocked address 10.0.0.5');
    expect(findUrlPolicyViolation('http://172.20.1.1/', strict)).toBe('blocked address 172.20.1.1');
    expect(findUrlPolicyViolation('http://169.254.169.254/', strict)).toBe('blocked address 169.254.169.254');
    expect(findUrlPolicyViolation('http://[::1]/', strict)).toBe('blocked address ::1');
    expect(findUrlPolicyViolation('http://[::ffff:127.0.0.1]/', strict)).toBe('blocked address ::ffff:7f00:1');
  });

  it('skips the address checks when host blocking is off', () => {
    expect(findUrlPolicyViolation('http://localhost/', { blockPrivateHosts: false })).toBeNull();
  });
});
