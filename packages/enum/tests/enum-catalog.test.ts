import { afterEach, describe, expect, it } from 'vitest';

import {
  CrossRegistryOperationError,
  EnumCatalog,
  EnumerationNameCollisionError,
  isValueRef,
  isValueSetRef,
  SimpleEnumeration,
  UnknownEnumerationError,
  UnknownIdentifierError,
  ValueSet,
} from '../src/index.js';
import { DayEnum, Days, weekend } from './fixtures/day.js';

describe('EnumCatalog', () => {
  afterEach(() => {
    EnumCatalog.resetForTests();
  });

  describe('registration', () => {
    it('adds and looks up enumerations by name', () => {
      EnumCatalog.add(DayEnum);

      expect(EnumCatalog.has('Day')).toBe(true);
      expect(EnumCatalog.get('Day')).toBe(DayEnum);
      expect(EnumCatalog.names()).toEqual(['Day']);
    });

    it('accepts the same enumeration twice', () => {
      EnumCatalog.add(DayEnum);
      EnumCatalog.add(DayEnum);

      expect(EnumCatalog.names()).toEqual(['Day']);
    });

    it('rejects a different enumeration with a taken name', () => {
      EnumCatalog.add(new SimpleEnumeration({ name: 'Twin' }));

      expect(() => EnumCatalog.add(new SimpleEnumeration({ name: 'Twin' }))).toThrowError(
        EnumerationNameCollisionError
      );
    });

    it('keeps namespaces apart', () => {
      const twin = new SimpleEnumeration({ name: 'Twin' });
      EnumCatalog.add(new SimpleEnumeration({ name: 'Twin' }));
      EnumCatalog.add(twin, 'plugins');

      expect(EnumCatalog.get('Twin', 'plugins')).toBe(twin);
      expect(EnumCatalog.get('Twin')).not.toBe(twin);
      expect(EnumCatalog.has('Day', 'plugins')).toBe(false);
    });

    it('removes and resets', () => {
      EnumCatalog.add(DayEnum);
      EnumCatalog.add(DayEnum, 'other');

      expect(EnumCatalog.remove('Day')).toBe(true);
      expect(EnumCatalog.remove('Day')).toBe(false);
      expect(EnumCatalog.has('Day', 'other')).toBe(true);

      EnumCatalog.reset('other');
      expect(EnumCatalog.names('other')).toEqual([]);
    });
  });

  describe('revival', () => {
    it('revives values and value sets through JSON.parse', () => {
      EnumCatalog.add(DayEnum);
      const json = JSON.stringify({ day: Days.Friday, off: weekend, note: 'kept' });

      expect(json).toBe(
        '{"day":{"$enum":"Day","id":4},"off":{"$enum":"Day","mask":[96]},"note":"kept"}'
      );

      const parsed: { day: unknown; off: unknown; note: unknown } = JSON.parse(
        json,
        EnumCatalog.reviver()
      );

      expect(parsed.day).toBe(Days.Friday);
      expect(parsed.off).toBeInstanceOf(ValueSet);
      expect(weekend.equals(parsed.off)).toBe(true);
      expect(parsed.note).toBe('kept');
    });

    it('leaves objects that are not references alone', () => {
      EnumCatalog.add(DayEnum);
      const parsed: unknown = JSON.parse('{"a":1,"b":{"$enum":"Day"}}', EnumCatalog.reviver());

      expect(parsed).toEqual({ a: 1, b: { $enum: 'Day' } });
    });

    it('revives through a namespace', () => {
      EnumCatalog.add(DayEnum, 'archive');

      expect(EnumCatalog.revive({ $enum: 'Day', id: 6 }, 'archive')).toBe(Days.Sunday);
      expect(() => EnumCatalog.revive({ $enum: 'Day', id: 6 })).toThrowError(
        UnknownEnumerationError
      );
    });

    it('fails on unknown enumerations and ids', () => {
      EnumCatalog.add(DayEnum);

      expect(() => EnumCatalog.revive({ $enum: 'Month', id: 0 })).toThrowError(
        UnknownEnumerationError
      );
      expect(() => EnumCatalog.revive({ $enum: 'Day', id: 12 })).toThrowError(
        UnknownIdentifierError
      );
    });

    it('lists cataloged enumerations when revival fails', () => {
      EnumCatalog.add(DayEnum);

      try {
        EnumCatalog.revive({ $enum: 'Month', id: 0 });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(UnknownEnumerationError);
        if (error instanceof UnknownEnumerationError) {
          expect(error.namespace).toBe('default');
          expect(error.available).toEqual(['Day']);
        }
      }
    });
  });

  describe('Enumeration.revive', () => {
    it('accepts references and raw ids', () => {
      expect(DayEnum.revive({ $enum: 'Day', id: 3 })).toBe(Days.Thursday);
      expect(DayEnum.revive(3)).toBe(Days.Thursday);
    });

    it('rejects references to another enumeration', () => {
      expect(() => DayEnum.revive({ $enum: 'Month', id: 3 })).toThrowError(
        CrossRegistryOperationError
      );
    });
  });

  describe('reference guards', () => {
    it('recognizes serialized shapes', () => {
      expect(isValueRef({ $enum: 'Day', id: 1 })).toBe(true);
      expect(isValueRef({ $enum: 'Day' })).toBe(false);
      expect(isValueRef(null)).toBe(false);
      expect(isValueSetRef({ $enum: 'Day', mask: [1, 2] })).toBe(true);
      expect(isValueSetRef({ $enum: 'Day', mask: ['1'] })).toBe(false);
      expect(isValueSetRef({ $enum: 'Day', id: 1 })).toBe(false);
    });
  });
});
