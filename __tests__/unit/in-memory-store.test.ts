import { describe, it, expect } from '@jest/globals';
import { InMemoryRegistrationStore, RegistrationNotFoundError } from '../../src/index.js';
import { createRegistration } from '../test-utils.js';

describe('InMemoryRegistrationStore', () => {
  it('resolves registrations by identifier', async () => {
    const registration = createRegistration('reg-1', []);
    const store = new InMemoryRegistrationStore([registration]);

    await expect(store.getClientRegistrationById('reg-1')).resolves.toBe(registration);
  });

  it('rejects unknown identifiers', async () => {
    const store = new InMemoryRegistrationStore();

    await expect(store.getClientRegistrationById('reg-2')).rejects.toThrow(
      "No client registration was found for the identifier 'reg-2'",
    );
    await expect(store.getClientRegistrationById('reg-2')).rejects.toBeInstanceOf(
      RegistrationNotFoundError,
    );
  });

  it('replaces a registration added under the same identifier', async () => {
    const store = new InMemoryRegistrationStore([createRegistration('reg-1', [])]);
    const rotated = { ...createRegistration('reg-1', []), clientId: 'rotated' };

    store.add(rotated);

    expect(store.list()).toEqual([rotated]);
    await expect(store.getClientRegistrationById('reg-1')).resolves.toBe(rotated);
  });

  it('removes registrations', () => {
    const store = new InMemoryRegistrationStore([createRegistration('reg-1', [])]);

    expect(store.remove('reg-1')).toBe(true);
    expect(store.remove('reg-1')).toBe(false);
    expect(store.list()).toEqual([]);
  });

  it('refuses registrations without an identifier', () => {
    expect(() => new InMemoryRegistrationStore([createRegistration('', [])])).toThrow(TypeError);
  });
});
