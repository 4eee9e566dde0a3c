import { ENTRY_SEPARATOR, PAIR_SEPARATOR } from '../constants/defaults.js';
import { debugNaming } from '../utils/debug.js';

/**
 * Properties carried by a transport name.
 */
export type PropertyBag = ReadonlyMap<string, string>;

export type PropertyInput = PropertyBag | Readonly<Record<string, string>>;

const EMPTY_BAG: PropertyBag = new Map<string, string>();

function entriesOf(properties: PropertyInput): Iterable<[string, string]> {
  return properties instanceof Map ? properties.entries() : Object.entries(properties);
}

/**
 * Flattens a set of properties into a transport name.
 *
 * The codec does not validate its input: keys or values that are empty or that contain
 * one of the separators will not survive a round trip. Use `createTransportName` when
 * the values come from configuration.
 */
export function encodeTransportName(prefix: string, properties: PropertyInput): string {
  const entries: string[] = [];
  for (const [key, value] of entriesOf(properties)) {
    entries.push(key + PAIR_SEPARATOR + value);
  }

  return `${prefix}:${entries.join(ENTRY_SEPARATOR)}`;
}

export function isManagedTransportName(name: string | undefined, prefix: string): name is string {
  return typeof name === 'string' && name.length > 0 && name.startsWith(`${prefix}:`);
}

/**
 * Extracts the properties flowed through a transport name.
 *
 * Names that do not start with `<prefix>:` belong to transports this library does not
 * manage and decode to an empty bag. Entries that do not split into exactly one
 * non-empty key and one non-empty value are dropped.
 */
export function decodeTransportName(name: string | undefined, prefix: string): PropertyBag {
  if (!isManagedTransportName(name, prefix)) {
    return EMPTY_BAG;
  }

  const properties = new Map<string, string>();
  const payload = name.slice(prefix.length + 1);

  for (const entry of payload.split(ENTRY_SEPARATOR)) {
    if (entry.length === 0) continue;

    const parts = entry.split(PAIR_SEPARATOR).filter((part) => part.length > 0);
    if (parts.length !== 2) {
      debugNaming('dropping malformed entry in transport name (%d parts)', parts.length);
      continue;
    }

    properties.set(parts[0], parts[1]);
  }

  return properties;
}

/**
 * Reads a boolean flag the way it is written in transport names ("true"/"false", any case).
 */
export function readBooleanProperty(properties: PropertyBag, key: string): boolean {
  const value = properties.get(key);
  return value !== undefined && value.trim().toLowerCase() === 'true';
}
