/**
 * Layer Merger for instance-metadata
 *
 * Folds option layers into one mapping. The order of the layers is the
 * precedence: each layer's keys replace those of the layers before it,
 * keys that appear in only one layer are kept as they are.
 */

import type { InstanceMetadata, MetadataValue } from '../types.js';

/**
 * Merge option layers left to right.
 * Values are copied, so the result never shares objects or arrays with
 * its inputs.
 *
 * @param layers - Option layers, lowest precedence first
 * @returns Merged options
 */
export function mergeLayers(...layers: Readonly<InstanceMetadata>[]): InstanceMetadata {
  return layers.reduce<InstanceMetadata>((merged, layer) => {
    for (const [key, value] of Object.entries(layer)) {
      merged[key] = structuredClone(value);
    }
    return merged;
  }, {});
}

/**
 * Return the first value that is neither null nor undefined.
 * Used where a single option is resolved ahead of the full merge.
 *
 * @param candidates - Values in precedence order, highest first
 * @returns The first present value, or undefined
 */
export function firstPresent(
  ...candidates: (MetadataValue | undefined)[]
): MetadataValue | undefined {
  return candidates.find((value) => value !== null && value !== undefined);
}

/**
 * Merge option layers left to right, combining nested mappings.
 * Mappings are merged key by key; arrays and scalars replace. Used for
 * role attributes, which combine across the roles of a run list.
 *
 * @param layers - Option layers, lowest precedence first
 * @returns Merged options
 */
export function deepMergeLayers(...layers: Readonly<InstanceMetadata>[]): InstanceMetadata {
  return layers.reduce<InstanceMetadata>((merged, layer) => {
    for (const [key, value] of Object.entries(layer)) {
      const current = merged[key];
      merged[key] =
        isMapping(current) && isMapping(value)
          ? deepMergeLayers(current, value)
          : structuredClone(value);
    }
    return merged;
  }, {});
}

function isMapping(value: MetadataValue | undefined): value is InstanceMetadata {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
