import { describe, it, expect } from 'vitest';
import { formatKeyFile, parseKeyFile } from './key-file.js';

describe('formatKeyFile', () => {
  it('writes the creation time and public key as comments above the secret line', () => {
    const content = formatKeyFile(
      { publicIdentifier: 'ekpub1-test', secretMaterial: Buffer.from('EK-SECRET-KEY-test-secret') },
      new Date('2026-01-02T03:04:05.000Z'),
    );

    expect(content.toString('utf-8')).toBe(
      '# created: 2026-01-02T03:04:05.000Z\n# public key: ekpub1-test\nEK-SECRET-KEY-test-secret\n',
    );
  });
});

describe('parseKeyFile', () => {
  it('reads back what formatKeyFile wrote', () => {
    const parsed = parseKeyFile(
      formatKeyFile({ publicIdentifier: 'ekpub1-test', secretMaterial: Buffer.from('EK-SECRET-KEY-test-secret') }),
    );

    expect(parsed?.publicIdentifier).toBe('ekpub1-test');
    expect(parsed?.secretMaterial.toString('utf-8')).toBe('EK-SECRET-KEY-test-secret');
  });

  it('leaves the public identifier undefined without a comment', () => {
    const parsed = parseKeyFile(Buffer.from('\nAGE-SECRET-KEY-TEST\n'));

    expect(parsed?.publicIdentifier).toBeUndefined();
    expect(parsed?.secretMaterial.toString('utf-8')).toBe('AGE-SECRET-KEY-TEST');
  });

  it('uses only the first identity', () => {
    const parsed = parseKeyFile(Buffer.from('first-secret\nsecond-secret\n'));
    expect(parsed?.secretMaterial.toString('utf-8')).toBe('first-secret');
  });

  it('returns null when there is no secret line', () => {
    expect(parseKeyFile(Buffer.from('# public key: ekpub1-test\n\n'))).toBeNull();
    expect(parseKeyFile(Buffer.alloc(0))).toBeNull();
  });
});
