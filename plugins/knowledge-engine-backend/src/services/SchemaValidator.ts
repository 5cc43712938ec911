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

/**
 * Settings schema validation
 * Checks engine-declared schemas against the accepted grammar and
 * validates settings against them with Ajv
 *
 * @packageDocumentation
 */

import Ajv, { ErrorObject, ValidateFunction } from 'ajv';
import type { Logger } from 'winston';
import { SettingsSchema } from '../models';
import { SchemaDefinitionError, SettingsValidationError, errorMessage } from '../errors';

const ALLOWED_KEYWORDS = new Set([
  '$schema',
  'type',
  'title',
  'description',
  'properties',
  'required',
  'enum',
  'default',
  'minimum',
  'maximum',
  'items',
  'additionalProperties',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map(error => {
    const path = error.instancePath || 'settings';
    if (error.keyword === 'additionalProperties' && typeof error.params.additionalProperty === 'string') {
      return `${path} must not have additional property '${error.params.additionalProperty}'`;
    }
    return `${path} ${error.message ?? 'is invalid'}`;
  });
}

/**
 * Validates settings schemas and the settings they describe
 */
export class SchemaValidator {
  private readonly logger: Logger;
  private readonly ajv: Ajv;
  private readonly validators: WeakMap<SettingsSchema, ValidateFunction> = new WeakMap();

  constructor(logger: Logger) {
    this.logger = logger;
    this.ajv = new Ajv({ allErrors: true, useDefaults: true });
  }

  /**
   * @throws SchemaDefinitionError when the schema is not valid Draft-7 or
   * leaves the accepted keyword subset
   */
  assertValidSchema(schema: SettingsSchema): void {
    const metaValid = this.ajv.validateSchema(schema);
    if (metaValid !== true) {
      throw new SchemaDefinitionError(
        `Settings schema is not valid JSON Schema: ${formatErrors(this.ajv.errors).join('; ')}`
      );
    }

    const root: unknown = schema;
    if (!isRecord(root) || root.type !== 'object' || !isRecord(root.properties)) {
      throw new SchemaDefinitionError('Settings schema must be an object schema with properties');
    }

    const problems: string[] = [];
    this.checkNode(root, '#', problems);
    if (problems.length > 0) {
      throw new SchemaDefinitionError(`Settings schema uses unsupported constructs: ${problems.join('; ')}`);
    }
  }

  /**
   * Validate settings, returning a defaulted copy
   *
   * @throws SettingsValidationError listing every violation
   */
  validateSettings(schema: SettingsSchema, value: unknown): Record<string, unknown> {
    const settings = structuredClone(value ?? {});
    if (!isRecord(settings)) {
      throw new SettingsValidationError('Invalid settings', ['settings must be an object']);
    }

    const validate = this.getValidator(schema);
    if (!validate(settings)) {
      const errors = formatErrors(validate.errors);
      this.logger.debug(`Settings rejected: ${errors.join('; ')}`);
      throw new SettingsValidationError('Invalid settings', errors);
    }
    return settings;
  }

  private getValidator(schema: SettingsSchema): ValidateFunction {
    const cached = this.validators.get(schema);
    if (cached) {
      return cached;
    }

    let validate: ValidateFunction;
    try {
      validate = this.ajv.compile(schema);
    } catch (error) {
      throw new SchemaDefinitionError(`Settings schema cannot be compiled: ${errorMessage(error)}`, { cause: error });
    }
    this.validators.set(schema, validate);
    return validate;
  }

  private checkNode(node: Record<string, unknown>, path: string, problems: string[]): void {
    for (const keyword of Object.keys(node)) {
      if (!ALLOWED_KEYWORDS.has(keyword)) {
        problems.push(`${path} uses keyword '${keyword}'`);
      }
    }

    const properties = isRecord(node.properties) ? node.properties : {};
    for (const [name, property] of Object.entries(properties)) {
      if (isRecord(property)) {
        this.checkNode(property, `${path}/properties/${name}`, problems);
      }
    }

    if (Array.isArray(node.required)) {
      for (const name of node.required) {
        if (typeof name !== 'string' || !Object.hasOwn(properties, name)) {
          problems.push(`${path} requires undeclared property '${String(name)}'`);
        }
      }
    }

    if (isRecord(node.items)) {
      this.checkNode(node.items, `${path}/items`, problems);
    }
  }
}
