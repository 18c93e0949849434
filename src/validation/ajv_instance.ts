/**
 * Ajv validation instance with schema validators
 * Raw snapshot, assumption and config JSON must validate before use
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { loadSchema } from './schema_loader';
import type { RawAssumptionInput, RawFinancialSnapshot } from '@/valuation/inputs';
import type { RawValuationConfig } from '@/core/config';

// Create Ajv instance with Draft 2020-12 support
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

// Add format validators (date etc.)
addFormats(ajv);

// Lazy-loaded validators
let snapshotValidator: ValidateFunction<RawFinancialSnapshot> | null = null;
let assumptionInputValidator: ValidateFunction<RawAssumptionInput> | null = null;
let configValidator: ValidateFunction<RawValuationConfig> | null = null;

export function getFinancialSnapshotValidator(): ValidateFunction<RawFinancialSnapshot> {
  if (!snapshotValidator) {
    snapshotValidator = ajv.compile<RawFinancialSnapshot>(loadSchema('financial_snapshot.v1'));
  }
  return snapshotValidator;
}

export function getAssumptionInputValidator(): ValidateFunction<RawAssumptionInput> {
  if (!assumptionInputValidator) {
    assumptionInputValidator = ajv.compile<RawAssumptionInput>(loadSchema('assumption_input.v1'));
  }
  return assumptionInputValidator;
}

export function getValuationConfigValidator(): ValidateFunction<RawValuationConfig> {
  if (!configValidator) {
    configValidator = ajv.compile<RawValuationConfig>(loadSchema('valuation_config.v1'));
  }
  return configValidator;
}

export interface ValidationResult<T> {
  valid: boolean;
  data: T | null;
  errors: string[] | null;
}

function runValidator<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}

export function validateFinancialSnapshot(data: unknown): ValidationResult<RawFinancialSnapshot> {
  return runValidator(getFinancialSnapshotValidator(), data);
}

export function validateAssumptionInput(data: unknown): ValidationResult<RawAssumptionInput> {
  return runValidator(getAssumptionInputValidator(), data);
}

export function validateValuationConfig(data: unknown): ValidationResult<RawValuationConfig> {
  return runValidator(getValuationConfigValidator(), data);
}
