import { RegistrationNotFoundError } from '../errors/transport-errors.js';
import type { ClientRegistration, ClientRegistrationResolver } from './types.js';

/**
 * Registration resolver backed by a Map.
 *
 * Registrations can be replaced at any time (e.g. to rotate credentials); transports built
 * afterwards observe the new value.
 */
export class InMemoryRegistrationStore implements ClientRegistrationResolver {
  private readonly registrations = new Map<string, ClientRegistration>();

  constructor(registrations: Iterable<ClientRegistration> = []) {
    for (const registration of registrations) {
      this.add(registration);
    }
  }

  add(registration: ClientRegistration): this {
    if (!registration.registrationId) {
      throw new TypeError('A client registration must have a non-empty registrationId');
    }
    this.registrations.set(registration.registrationId, registration);
    return this;
  }

  remove(registrationId: string): boolean {
    return this.registrations.delete(registrationId);
  }

  list(): ClientRegistration[] {
    return [...this.registrations.values()];
  }

  async getClientRegistrationById(registrationId: string): Promise<ClientRegistration> {
    const registration = this.registrations.get(registrationId);
    if (!registration) {
      throw RegistrationNotFoundError.forIdentifier(registrationId);
    }
    return registration;
  }
}
