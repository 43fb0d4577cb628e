/**
 * Car catalog
 *
 * Static, frozen table of supported cars and the matching of advertised
 * Bluetooth names against it. Loaded once per process.
 */

import rows from './car-models.json';
import { NOT_ADVERTISED } from './types';

import type { CarModel } from '$types/common';
import type { CarModelRow } from './types';

function toCarModel(row: CarModelRow): CarModel {
  return Object.freeze({
    internalName: row.internalName,
    displayName: row.displayName,
    bluetoothName: row.bluetoothName === NOT_ADVERTISED ? null : row.bluetoothName
  });
}

/**
 * Every supported car, in catalog order
 */
export const CAR_MODELS: readonly CarModel[] = Object.freeze(rows.map(toCarModel));

/**
 * List supported cars
 * @returns The frozen catalog
 */
export function listModels(): readonly CarModel[] {
  return CAR_MODELS;
}

/**
 * Match an advertised name against the catalog
 *
 * Exact match first (case-insensitive), then the longest Bluetooth name
 * the advertised name starts with, so "SL-SF90 Spider N" picks the black
 * Spider rather than the plain one. Models that never advertise are skipped.
 *
 * @param advertisedName - Local name from the advertisement
 * @param models - Catalog to search
 * @returns Matching model, or null
 */
export function matchModel(advertisedName: string, models: readonly CarModel[] = CAR_MODELS): CarModel | null {
  const name = advertisedName.trim().toLowerCase();
  if (name === '') return null;

  let best: CarModel | null = null;
  let bestLength = 0;

  for (const model of models) {
    if (model.bluetoothName === null) continue;

    const pattern = model.bluetoothName.toLowerCase();
    if (pattern === name) {
      return model;
    }
    if (name.startsWith(pattern) && pattern.length > bestLength) {
      best = model;
      bestLength = pattern.length;
    }
  }

  return best;
}

/**
 * Human label: display name, or the internal name when the display name is empty
 */
export function modelLabel(model: CarModel): string {
  return model.displayName !== '' ? model.displayName : model.internalName;
}
