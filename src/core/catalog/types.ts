/**
 * Catalog row as stored in car-models.json
 */
export interface CarModelRow {
  internalName: string;
  displayName: string;
  /** Advertised name, or NOT_ADVERTISED */
  bluetoothName: string;
}

/**
 * Marker in the Bluetooth name column for models that never advertise
 */
export const NOT_ADVERTISED = '---';
