/*
 * Copyright (C) 2025-2026 flickleafy
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU General Public License for more details.
 *
 * You should have received a copy of the GNU General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

import { describe, expect, it } from '@jest/globals';
import { SchemaValidator } from './SchemaValidator';
import { SchemaDefinitionError, SettingsValidationError } from '../errors';
import { SettingsSchema } from '../models';
import { createTestLogger } from '../testUtils';

const schema: SettingsSchema = {
  type: 'object',
  properties: {
    index_mode: { type: 'string', enum: ['general', 'qa'], default: 'general' },
    chunk_size: { type: 'integer', minimum: 16, maximum: 2000, default: 512 },
    tags: { type: 'array', items: { type: 'string' } },
  },
  required: ['index_mode'],
  additionalProperties: false,
};

describe('SchemaValidator', () => {
  const validator = new SchemaValidator(createTestLogger());

  describe('assertValidSchema', () => {
    it('accepts schemas within the grammar', () => {
      expect(() => validator.assertValidSchema(schema)).not.toThrow();
    });

    it('rejects keywords outside the grammar', () => {
      const withPattern = {
        type: 'object',
        properties: { name: { type: 'string', pattern: '^[a-z]+$' } },
      } as unknown as SettingsSchema;

      expect(() => validator.assertValidSchema(withPattern)).toThrow(
        "Settings schema uses unsupported constructs: #/properties/name uses keyword 'pattern'"
      );
    });

    it('rejects required entries that are not declared', () => {
      expect(() =>
        validator.assertValidSchema({ type: 'object', properties: {}, required: ['missing'] })
      ).toThrow("# requires undeclared property 'missing'");
    });

    it('rejects schemas that are not valid JSON Schema', () => {
      const invalid = { type: 'object', properties: { size: { type: 'size' } } } as unknown as SettingsSchema;

      expect(() => validator.assertValidSchema(invalid)).toThrow(SchemaDefinitionError);
    });

    it('requires an object root with properties', () => {
      const root = { type: 'string' } as unknown as SettingsSchema;

      expect(() => validator.assertValidSchema(root)).toThrow(
        'Settings schema must be an object schema with properties'
      );
    });
  });

  describe('validateSettings', () => {
    it('fills defaults into a copy', () => {
      const input = { index_mode: 'qa' };

      const settings = validator.validateSettings(schema, input);

      expect(settings).toEqual({ index_mode: 'qa', chunk_size: 512 });
      expect(input).toEqual({ index_mode: 'qa' });
    });

    it('defaults a missing settings object', () => {
      expect(validator.validateSettings(schema, undefined)).toEqual({ index_mode: 'general', chunk_size: 512 });
    });

    it('lists every violation', () => {
      const error = (() => {
        try {
          validator.validateSettings(schema, { index_mode: 'fast', chunk_size: 8, colour: 'red' });
        } catch (e) {
          return e;
        }
        return undefined;
      })();

      expect(error).toBeInstanceOf(SettingsValidationError);
      expect(error).toMatchObject({
        errors: expect.arrayContaining([
          "settings must not have additional property 'colour'",
          '/index_mode must be equal to one of the allowed values',
          '/chunk_size must be >= 16',
        ]),
      });
    });

    it('rejects values that are not objects', () => {
      expect(() => validator.validateSettings(schema, [1, 2])).toThrow(
        'Invalid settings: settings must be an object'
      );
    });
  });
});
