// src/constants/default-mappings.ts

import type { MappingConfig } from '../types/signal-types.js';

/**
 * Built-in lamp controller layout: headlamp state, lamp power and the
 * ambient light sensor, each a single little-endian field at bit 0.
 */
export const DEFAULT_MAPPING_CONFIG: MappingConfig = {
  message_definitions: [
    {
      id: '0x100',
      name: 'HeadlampControl',
      dlc: 8,
      description: 'Headlamp control message',
      signals: [{ name: 'HeadlampStatus', start_bit: 0, bit_length: 8, kind: 'uint8' }],
    },
    {
      id: '0x101',
      name: 'LampPowerStatus',
      dlc: 8,
      description: 'Lamp power status',
      signals: [
        { name: 'LampPower', start_bit: 0, bit_length: 16, kind: 'uint16', scale: 1, unit: 'W' },
      ],
    },
    {
      id: '0x102',
      name: 'AmbientLightSensor',
      dlc: 8,
      signals: [
        { name: 'AmbientLight', start_bit: 0, bit_length: 16, kind: 'uint16', unit: 'lux' },
      ],
    },
  ],
  mappings: [
    {
      id: '0x100',
      signals: [{ name: 'HeadlampStatus', destination: 'Vehicle.Body.Lights.IsHighBeamOn' }],
    },
    {
      id: '0x101',
      signals: [{ name: 'LampPower', destination: 'Vehicle.Body.Lighting.Power' }],
    },
    {
      id: '0x102',
      signals: [{ name: 'AmbientLight', destination: 'Vehicle.Body.Lights.AmbientLight' }],
    },
  ],
};
