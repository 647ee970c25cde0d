/**
 * Availability Zone Derivation
 *
 * Fills in `availability_zone` from the configured zones of the merged
 * `region`. Runs on the fully merged options, never on a single layer.
 */

import type { InstanceMetadata } from '../types.js';

/**
 * Return a copy of the options with `availability_zone` set to the first
 * configured zone of `region`, when a region is set and no zone is.
 * Unknown regions and regions without zones leave the options unchanged.
 *
 * @param metadata - Fully merged options
 * @param zones - Region name to ordered availability zone names
 */
export function deriveAvailabilityZone(
  metadata: InstanceMetadata,
  zones: Readonly<Record<string, readonly string[]>>
): InstanceMetadata {
  const region = metadata['region'];
  const zone = metadata['availability_zone'];

  if (typeof region !== 'string' || (zone !== undefined && zone !== null)) {
    return metadata;
  }

  const firstZone = Object.hasOwn(zones, region) ? zones[region]?.[0] : undefined;
  if (firstZone === undefined) {
    return metadata;
  }

  return { ...metadata, availability_zone: firstZone };
}
