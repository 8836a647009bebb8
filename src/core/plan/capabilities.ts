/**
 * Capabilities a generator may declare, and the explicit authorization check.
 */
import type { CapabilityNote } from './types.js';
import type { CapabilitySettings } from '../config/index.js';
import type { GeneratorDefinition } from '../store/types.js';
import { CapabilityError, ErrorCodes } from '../../utils/errors.js';

export const KNOWN_CAPABILITIES: Readonly<Record<string, string>> = {
  'filesystem-write': 'Writes new source files into the project tree.',
  'network-entitlement-note':
    'Sends data over the network. Sandboxed macOS targets need the com.apple.security.network.client entitlement.',
  'push-entitlement-note': 'Uses push notifications. Enable the Push Notifications capability for the app target.',
  'keychain-entitlement-note': 'Stores secrets in the Keychain. Add a Keychain Sharing group if extensions need access.',
  'privacy-manifest-note':
    'Collects usage or diagnostic data. Declare the collected data types in PrivacyInfo.xcprivacy.',
};

export function isKnownCapability(capability: string): boolean {
  return Object.prototype.hasOwnProperty.call(KNOWN_CAPABILITIES, capability);
}

/**
 * Throw CapabilityError unless every capability the generator declares is
 * authorized. With no explicit allow list, every known capability is.
 */
export function authorizeCapabilities(definition: GeneratorDefinition, settings: CapabilitySettings): void {
  const allowed = settings.allow ?? Object.keys(KNOWN_CAPABILITIES);
  const missing = definition.capabilities.filter((capability) => !allowed.includes(capability));
  if (missing.length === 0) return;

  throw new CapabilityError(
    ErrorCodes.CAPABILITY_DENIED,
    `Generator '${definition.id}' requires capabilities that are not authorized: ${missing.join(', ')}`,
    {
      generatorId: definition.id,
      missing,
      unknown: missing.filter((capability) => !isKnownCapability(capability)),
      allowed,
    }
  );
}

export function capabilityNotes(definition: GeneratorDefinition): CapabilityNote[] {
  return definition.capabilities.map((capability) => ({
    capability,
    note: KNOWN_CAPABILITIES[capability] ?? 'No description available.',
  }));
}
