import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SignalKind } from '../src/constants/constants.js';
import { ConfigError } from '../src/errors.js';
import { MappingTable } from '../src/mapping/mapping-table.js';
import type { MessageDefinition } from '../src/types/signal-types.js';

const fixture = (name: string): string =>
  fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

function message(id: number, name: string = 'Test'): MessageDefinition {
  return {
    id,
    name,
    dlc: 8,
    signals: {
      Value: { name: 'Value', startBit: 0, bitLength: 16, kind: SignalKind.UINT16 },
    },
  };
}

const legacyPayload = {
  message_definitions: [
    {
      can_id: 512,
      name: 'Legacy',
      dlc: 8,
      signals: [{ name: 'Temp', start_bit: 0, bit_length: 8, type: 'int8' }],
    },
  ],
  mappings: [{ can_id: '200', signals: [{ name: 'Temp', vss_path: 'Vehicle.Cabin.Temperature' }] }],
};

describe('MappingTable', () => {
  let table: MappingTable;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    table = new MappingTable();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('registerMessage', () => {
    it('applies defaults to optional fields', () => {
      const resolved = table.registerMessage(message(0x200));
      expect(resolved.cycleTime).toBe(0);
      expect(resolved.description).toBe('');
      expect(resolved.signals['Value']).toEqual({
        name: 'Value',
        startBit: 0,
        bitLength: 16,
        kind: SignalKind.UINT16,
        scale: 1,
        offset: 0,
        unit: '',
        description: '',
      });
    });

    it('overwrites an existing definition with the same id', () => {
      table.registerMessage(message(0x100, 'First'));
      table.registerMessage(message(0x100, 'Second'));
      expect(table.getMessage(0x100)?.name).toBe('Second');
      expect(table.size.messages).toBe(1);
    });

    it('rejects a signal that does not fit in dlc bytes', () => {
      const definition: MessageDefinition = {
        id: 0x300,
        name: 'Short',
        dlc: 2,
        signals: { A: { name: 'A', startBit: 8, bitLength: 16, kind: SignalKind.UINT16 } },
      };
      expect(() => table.registerMessage(definition)).toThrow(ConfigError);
      expect(() => table.registerMessage(definition)).toThrow(
        'Invalid configuration at message 0x300.signals.A: bits 8..23 do not fit in 2 bytes'
      );
      expect(table.hasMessage(0x300)).toBe(false);
    });

    it('rejects a signal registered under another name', () => {
      const definition: MessageDefinition = {
        id: 0x300,
        name: 'Mismatch',
        dlc: 8,
        signals: { A: { name: 'B', startBit: 0, bitLength: 8, kind: SignalKind.UINT8 } },
      };
      expect(() => table.registerMessage(definition)).toThrow(ConfigError);
    });

    it('rejects min greater than max and bad bit lengths', () => {
      const inverted = message(0x301);
      inverted.signals['Value'] = { ...inverted.signals['Value'], name: 'Value', min: 10, max: 5 };
      const wide = message(0x302);
      wide.signals['Value'] = { name: 'Value', startBit: 0, bitLength: 33, kind: SignalKind.UINT32 };

      expect(() => table.registerMessage(inverted)).toThrow('min 10 is greater than max 5');
      expect(() => table.registerMessage(wide)).toThrow('bit length 33 is outside 1..32');
    });
  });

  describe('addMapping', () => {
    it('adds and overwrites destinations per signal', () => {
      table.addMapping(0x100, 'Value', 'Vehicle.A');
      table.addMapping(0x100, 'Value', 'Vehicle.B');
      table.addMapping(0x100, 'Other', 'Vehicle.C');
      expect(table.getMappings(0x100)).toEqual({ Value: 'Vehicle.B', Other: 'Vehicle.C' });
      expect(table.size.mappings).toBe(2);
    });

    it('rejects bad identifiers and empty destinations', () => {
      expect(() => table.addMapping(-1, 'Value', 'Vehicle.A')).toThrow(ConfigError);
      expect(() => table.addMapping(0x20000000, 'Value', 'Vehicle.A')).toThrow(ConfigError);
      expect(() => table.addMapping(0x100, 'Value', '')).toThrow(
        'Invalid configuration at mapping 0x100.Value: destination must be a non-empty string'
      );
    });

    it('returns a copy from getMappings', () => {
      table.addMapping(0x100, 'Value', 'Vehicle.A');
      const mappings = table.getMappings(0x100);
      mappings['Value'] = 'Vehicle.Changed';
      expect(table.getDestination(0x100, 'Value')).toBe('Vehicle.A');
    });
  });

  describe('removal', () => {
    it('removes messages and mappings', () => {
      table.registerMessage(message(0x100));
      table.addMapping(0x100, 'Value', 'Vehicle.A');

      expect(table.removeMapping(0x100, 'Value')).toBe(true);
      expect(table.hasMappings(0x100)).toBe(false);
      expect(table.removeMapping(0x100, 'Value')).toBe(false);
      expect(table.removeMessage(0x100)).toBe(true);
      expect(table.removeMessage(0x100)).toBe(false);
    });
  });

  describe('view', () => {
    it('is not affected by later mutations', () => {
      const before = table.view();
      table.registerMessage(message(0x100));
      table.addMapping(0x100, 'Value', 'Vehicle.A');

      expect(before.messages.has(0x100)).toBe(false);
      expect(before.mappings.has(0x100)).toBe(false);
      expect(table.view().messages.has(0x100)).toBe(true);
    });
  });

  describe('load', () => {
    it('accepts the older field spellings and hex strings without prefix', () => {
      const summary = table.load(legacyPayload);

      expect(summary).toEqual({ messages: 1, mappings: 1 });
      expect(table.getMessage(0x200)?.signals['Temp']?.kind).toBe(SignalKind.INT8);
      expect(table.getDestination(0x200, 'Temp')).toBe('Vehicle.Cabin.Temperature');
    });

    it('registers the built-in defaults', () => {
      expect(table.useDefaults()).toEqual({ messages: 3, mappings: 3 });
      expect(table.messageIds()).toEqual([0x100, 0x101, 0x102]);
      expect(table.getDestination(0x101, 'LampPower')).toBe('Vehicle.Body.Lighting.Power');
    });

    it('merges into existing entries by default', () => {
      table.useDefaults();
      table.load(legacyPayload);
      expect(table.messageIds()).toEqual([0x100, 0x101, 0x102, 0x200]);
    });

    it('clears both registries first in replace mode', () => {
      table.useDefaults();
      table.load(legacyPayload, { mode: 'replace' });
      expect(table.messageIds()).toEqual([0x200]);
      expect(table.hasMappings(0x100)).toBe(false);
    });

    it('keeps the items applied before a malformed one', () => {
      const payload = {
        message_definitions: [
          {
            id: '0x200',
            name: 'Good',
            dlc: 8,
            signals: [{ name: 'A', start_bit: 0, bit_length: 8, kind: 'uint8' }],
          },
          {
            id: '0x201',
            name: 'Bad',
            dlc: 8,
            signals: [{ name: 'X', start_bit: 0, bit_length: 8, kind: 'double' }],
          },
        ],
        mappings: [{ id: '0x200', signals: [{ name: 'A', destination: 'Vehicle.A' }] }],
      };

      let caught: unknown;
      try {
        table.load(payload);
      } catch (error: unknown) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigError);
      if (caught instanceof ConfigError) {
        expect(caught.path).toBe('message_definitions[1].signals[0].kind');
        expect(caught.detail).toBe(
          'unknown kind "double", expected one of boolean, uint8, uint16, uint32, int8, int16, int32, float'
        );
      }
      expect(table.hasMessage(0x200)).toBe(true);
      expect(table.hasMessage(0x201)).toBe(false);
      expect(table.hasMappings(0x200)).toBe(false);
    });

    it('reports geometry errors with the item position', () => {
      const payload = {
        message_definitions: [
          {
            id: 0x300,
            name: 'Short',
            dlc: 2,
            signals: [{ name: 'A', start_bit: 8, bit_length: 16, kind: 'uint16' }],
          },
        ],
      };
      expect(() => table.load(payload)).toThrow(
        'Invalid configuration at message_definitions[0] (message 0x300.signals.A): bits 8..23 do not fit in 2 bytes'
      );
    });

    it('accepts signal names shared with object prototype members', () => {
      const payload = {
        message_definitions: [
          {
            id: 1,
            name: 'Reserved',
            dlc: 8,
            signals: [
              { name: 'constructor', start_bit: 0, bit_length: 8, kind: 'uint8' },
              { name: 'toString', start_bit: 8, bit_length: 8, kind: 'uint8' },
              { name: '__proto__', start_bit: 16, bit_length: 8, kind: 'uint8' },
            ],
          },
        ],
        mappings: [{ id: 1, signals: [{ name: '__proto__', destination: 'Vehicle.Reserved' }] }],
      };

      expect(table.load(payload)).toEqual({ messages: 1, mappings: 1 });
      expect(Object.keys(table.getMessage(1)?.signals ?? {})).toEqual(['constructor', 'toString', '__proto__']);
      expect(table.getDestination(1, '__proto__')).toBe('Vehicle.Reserved');
    });

    it('rejects duplicate signal names', () => {
      const payload = {
        message_definitions: [
          {
            id: 0x300,
            name: 'Twice',
            dlc: 8,
            signals: [
              { name: 'A', start_bit: 0, bit_length: 8, kind: 'uint8' },
              { name: 'A', start_bit: 8, bit_length: 8, kind: 'uint8' },
            ],
          },
        ],
      };
      expect(() => table.load(payload)).toThrow(
        'Invalid configuration at message_definitions[0].signals[1]: duplicate signal name "A"'
      );
    });

    it('rejects payloads that are not objects', () => {
      expect(() => table.load([])).toThrow('Invalid configuration: expected an object');
      expect(() => table.load({ mappings: 'none' })).toThrow(
        'Invalid configuration: "mappings" must be an array'
      );
    });
  });

  describe('loadFile', () => {
    it('reads a JSON mapping file', async () => {
      const summary = await table.loadFile(fixture('mappings.json'));

      expect(summary).toEqual({ messages: 1, mappings: 2 });
      expect(table.getMessage(0x300)?.cycleTime).toBe(100);
      expect(table.getMessage(0x300)?.signals['Voltage']?.unit).toBe('V');
      expect(table.getDestination(0x300, 'Current')).toBe(
        'Vehicle.Powertrain.TractionBattery.CurrentCurrent'
      );
    });

    it('turns a missing file into a ConfigError', async () => {
      const path = fixture('missing.json');
      await expect(table.loadFile(path)).rejects.toBeInstanceOf(ConfigError);
      await expect(table.loadFile(path)).rejects.toThrow(
        `Invalid configuration at ${path}: cannot read file`
      );
    });

    it('turns malformed JSON into a ConfigError', async () => {
      await expect(table.loadFile(fixture('broken.json'))).rejects.toThrow('invalid JSON');
      expect(table.size).toEqual({ messages: 0, mappings: 0 });
    });
  });
});
