import { describe, expect, it } from 'vitest';
import { activeIdentifiers, registerIdentifier, retireIdentifiers } from './identifier-registry.js';
import { defaultConfig } from './paths.js';

const base = defaultConfig('/home/dev/.envkeep');
const t1 = new Date('2026-01-01T00:00:00.000Z');
const t2 = new Date('2026-02-01T00:00:00.000Z');

describe('identifier registry', () => {
  it('registers identifiers in order', () => {
    const config = registerIdentifier(registerIdentifier(base, 'ekpub1a', t1), 'ekpub1b', t2);

    expect(activeIdentifiers(config)).toEqual(['ekpub1a', 'ekpub1b']);
    expect(config.identifiers[1]).toEqual({ identifier: 'ekpub1b', active: true, addedAt: t2.toISOString() });
  });

  it('returns the same config when the identifier is already active', () => {
    const config = registerIdentifier(base, 'ekpub1a', t1);

    expect(registerIdentifier(config, 'ekpub1a', t2)).toBe(config);
  });

  it('retires identifiers and keeps them as a record', () => {
    const config = retireIdentifiers(registerIdentifier(base, 'ekpub1a', t1), ['ekpub1a'], t2);

    expect(activeIdentifiers(config)).toEqual([]);
    expect(config.identifiers).toEqual([
      { identifier: 'ekpub1a', active: false, addedAt: t1.toISOString(), retiredAt: t2.toISOString() },
    ]);
  });

  it('re-activates a retired identifier without duplicating it', () => {
    const retired = retireIdentifiers(registerIdentifier(base, 'ekpub1a', t1), ['ekpub1a'], t2);

    const config = registerIdentifier(retired, 'ekpub1a', t2);

    expect(config.identifiers).toEqual([{ identifier: 'ekpub1a', active: true, addedAt: t1.toISOString() }]);
  });
});
