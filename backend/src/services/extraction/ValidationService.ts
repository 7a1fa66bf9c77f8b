import { addYears, isAfter, isValid, parseISO } from 'date-fns';
import type { FieldValue } from '@template-extract/shared/schemas/extractionResult.zod';
import type { FieldValidator } from '@template-extract/shared/schemas/templateDocument.zod';
import type { FieldRule } from '../../models/Template';
import { DEFAULT_VALIDATION_CONFIG } from '../../utils/config';
import type { ValidationConfig } from '../../utils/config';
import { AMOUNT_FORMATS, fromFixedPoint, parseAmount } from './amounts';

const NIP_WEIGHTS = [6, 5, 7, 2, 3, 4, 5, 6, 7];
const NIP_LENGTH = 10;
const NIP_MODULUS = 11;

const CUI_KEY = [7, 5, 3, 2, 1, 7, 5, 3, 2];
const CUI_MIN_LENGTH = 2;
const CUI_MAX_LENGTH = 10;
const CUI_MODULUS = 11;

const IBAN_MIN_LENGTH = 15;
const IBAN_MAX_LENGTH = 34;
const IBAN_MODULUS = 97;
const IBAN_SHAPE = /^[A-Z]{2}\d{2}[A-Z0-9]+$/;
const POLISH_NRB_LENGTH = 26;
const POLISH_COUNTRY_CODE = 'PL';
const LETTER_VALUE_OFFSET = 55;

const IBAN_LENGTHS: Readonly<Record<string, number>> = {
  AT: 20, BE: 16, BG: 22, CH: 21, CY: 28, CZ: 24, DE: 22, DK: 18, EE: 20, ES: 24,
  FI: 18, FR: 27, GB: 22, GR: 27, HR: 21, HU: 28, IE: 22, IT: 27, LT: 20, LU: 20,
  LV: 21, MT: 31, NL: 18, NO: 15, PL: 28, PT: 25, RO: 24, SE: 24, SI: 19, SK: 24,
};

export interface ValidationResult {
  passed: boolean;
  normalized: string;
  error?: string;
}

export type FieldValidationOutcome = { passed: true; value: FieldValue } | { passed: false; reason: string };

function digitsOf(value: string): number[] {
  return value.split('').map(Number);
}

/**
 * Polish tax identification number: ten digits, the last one a weighted
 * mod-11 checksum over the first nine.
 */
export function validateNip(value: string): ValidationResult {
  const normalized = value.replace(/\D/g, '');

  if (normalized.length !== NIP_LENGTH) {
    return { passed: false, normalized: value, error: `NIP must have ${NIP_LENGTH} digits, got ${normalized.length}` };
  }

  const digits = digitsOf(normalized);
  const checksum = NIP_WEIGHTS.reduce((sum, weight, index) => sum + weight * digits[index], 0) % NIP_MODULUS;

  if (checksum === NIP_MODULUS - 1 || checksum !== digits[NIP_LENGTH - 1]) {
    return { passed: false, normalized: value, error: 'NIP checksum mismatch' };
  }

  return { passed: true, normalized };
}

/**
 * Romanian fiscal code: the body is weighted right-aligned against the
 * control key, the check digit is (sum * 10) mod 11 with 10 read as 0.
 */
export function validateCui(value: string): ValidationResult {
  const normalized = value.replace(/\D/g, '');

  if (normalized.length < CUI_MIN_LENGTH || normalized.length > CUI_MAX_LENGTH) {
    return {
      passed: false,
      normalized: value,
      error: `CUI must have ${CUI_MIN_LENGTH}-${CUI_MAX_LENGTH} digits, got ${normalized.length}`,
    };
  }

  const digits = digitsOf(normalized);
  const checkDigit = digits[digits.length - 1];
  const body = digits.slice(0, -1);
  const keyOffset = CUI_KEY.length - body.length;
  const sum = body.reduce((acc, digit, index) => acc + digit * CUI_KEY[keyOffset + index], 0);
  const expected = ((sum * 10) % CUI_MODULUS) % 10;

  if (expected !== checkDigit) {
    return { passed: false, normalized: value, error: 'CUI checksum mismatch' };
  }

  return { passed: true, normalized };
}

function mod97(numeric: string): number {
  let remainder = 0;
  for (const char of numeric) {
    remainder = (remainder * 10 + Number(char)) % IBAN_MODULUS;
  }
  return remainder;
}

/**
 * International bank account number, mod-97 check. A bare 26-digit Polish
 * account number is read as a PL IBAN.
 */
export function validateIban(value: string): ValidationResult {
  let compact = value.replace(/[\s-]/g, '').toUpperCase();

  if (/^\d+$/.test(compact) && compact.length === POLISH_NRB_LENGTH) {
    compact = `${POLISH_COUNTRY_CODE}${compact}`;
  }

  if (compact.length < IBAN_MIN_LENGTH || compact.length > IBAN_MAX_LENGTH || !IBAN_SHAPE.test(compact)) {
    return { passed: false, normalized: value, error: 'IBAN has an invalid shape or length' };
  }

  const country = compact.slice(0, 2);
  const expectedLength = IBAN_LENGTHS[country];
  if (expectedLength !== undefined && compact.length !== expectedLength) {
    return {
      passed: false,
      normalized: value,
      error: `IBAN for ${country} must have ${expectedLength} characters, got ${compact.length}`,
    };
  }

  const rearranged = compact.slice(4) + compact.slice(0, 4);
  const numeric = rearranged.replace(/[A-Z]/g, (letter) => String(letter.charCodeAt(0) - LETTER_VALUE_OFFSET));

  if (mod97(numeric) !== 1) {
    return { passed: false, normalized: value, error: 'IBAN checksum mismatch' };
  }

  return { passed: true, normalized: compact };
}

export function validateDateSanity(isoDate: string, config: ValidationConfig, now: Date): ValidationResult {
  const parsed = parseISO(isoDate);

  if (!isValid(parsed)) {
    return { passed: false, normalized: isoDate, error: `"${isoDate}" is not a calendar date` };
  }

  if (parsed.getFullYear() < config.earliestYear) {
    return { passed: false, normalized: isoDate, error: `date is before ${config.earliestYear}` };
  }

  const latest = addYears(now, config.maxFutureYears);
  if (isAfter(parsed, latest)) {
    return {
      passed: false,
      normalized: isoDate,
      error: `date is more than ${config.maxFutureYears} years in the future`,
    };
  }

  return { passed: true, normalized: isoDate };
}

export function validateAmountSanity(fixedPoint: string, total: boolean, ceiling: string): ValidationResult {
  const minor = fromFixedPoint(fixedPoint);
  const limit = parseAmount(ceiling, AMOUNT_FORMATS.simple);

  if (minor === null) {
    return { passed: false, normalized: fixedPoint, error: `"${fixedPoint}" is not a fixed-point amount` };
  }

  if (total && minor <= 0n) {
    return { passed: false, normalized: fixedPoint, error: 'total amount must be positive' };
  }

  const absolute = minor < 0n ? -minor : minor;
  if (limit !== null && absolute > limit) {
    return { passed: false, normalized: fixedPoint, error: `amount exceeds the ceiling of ${ceiling}` };
  }

  return { passed: true, normalized: fixedPoint };
}

const CHECKSUM_VALIDATORS: Record<FieldValidator, (value: string) => ValidationResult> = {
  nip: validateNip,
  cui: validateCui,
  iban: validateIban,
};

export class ValidationService {
  constructor(private readonly config: ValidationConfig = DEFAULT_VALIDATION_CONFIG) {}

  validateField(rule: Pick<FieldRule, 'validator' | 'total'>, value: FieldValue, now: Date): FieldValidationOutcome {
    switch (value.type) {
      case 'date': {
        const result = validateDateSanity(value.value, this.config, now);
        return result.passed ? { passed: true, value } : { passed: false, reason: result.error ?? 'invalid date' };
      }
      case 'amount': {
        const result = validateAmountSanity(value.value, rule.total, this.config.amountCeiling);
        return result.passed ? { passed: true, value } : { passed: false, reason: result.error ?? 'invalid amount' };
      }
      case 'integer':
        return { passed: true, value };
      case 'text': {
        if (!rule.validator) {
          return { passed: true, value };
        }
        const result = CHECKSUM_VALIDATORS[rule.validator](value.value);
        return result.passed
          ? { passed: true, value: { type: 'text', value: result.normalized } }
          : { passed: false, reason: result.error ?? `${rule.validator} check failed` };
      }
    }
  }
}
