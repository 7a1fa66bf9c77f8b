const VISIBLE_LAST_CHARS = 4;
const MIN_LENGTH_FOR_PARTIAL_MASK = 6;

const TAX_ID_MASK_PREFIX = '******';
const ACCOUNT_MASK_PREFIX = '****';
const FULL_MASK = '****';
const EMAIL_MASK_REPLACEMENT = '***@***.***';

const SENSITIVE_FIELDS = ['tax_id', 'nip', 'cui', 'vat_id', 'iban', 'account', 'email', 'password', 'secret', 'token'];

const TAX_ID_FIELDS = ['tax_id', 'nip', 'cui', 'vat_id'];
const ACCOUNT_FIELDS = ['iban', 'account'];
const SECRET_FIELDS = ['password', 'secret', 'token'];
const FIELD_NAME_EMAIL = 'email';

// IBAN, optionally grouped in blocks of four
const IBAN_PATTERN = /\b[A-Z]{2}\d{2}(?:[ ]?[A-Z0-9]{4}){2,7}(?:[ ]?[A-Z0-9]{1,4})?\b/g;
// 26-digit Polish account number, optionally grouped 2 + 6x4
const NRB_PATTERN = /\b\d{2}(?:[ ]?\d{4}){6}\b/g;
// PL NIP written 123-456-78-90, 123-45-67-890 or as 10 plain digits
const NIP_PATTERN = /\b(?:\d{3}-\d{3}-\d{2}-\d{2}|\d{3}-\d{2}-\d{2}-\d{3}|\d{10})\b/g;
const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;

function cleanValue(value: string): string {
  return value.replace(/[\s-]/g, '');
}

function extractLastN(value: string, n: number): string {
  return value.slice(-n);
}

function matchesAny(fieldName: string, names: readonly string[]): boolean {
  return names.some((name) => fieldName.includes(name));
}

export class PIIMasker {
  maskField(fieldName: string, value: unknown): unknown {
    if (typeof value !== 'string' || !this.shouldMask(fieldName)) {
      return value;
    }

    const lowerFieldName = fieldName.toLowerCase();

    if (matchesAny(lowerFieldName, SECRET_FIELDS)) {
      return FULL_MASK;
    }

    if (matchesAny(lowerFieldName, TAX_ID_FIELDS)) {
      return this.maskTaxId(value);
    }

    if (matchesAny(lowerFieldName, ACCOUNT_FIELDS)) {
      return this.maskAccountNumber(value);
    }

    if (lowerFieldName.includes(FIELD_NAME_EMAIL)) {
      return EMAIL_MASK_REPLACEMENT;
    }

    return value;
  }

  maskObject(obj: object): Record<string, unknown> {
    const masked: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(obj)) {
      if (Array.isArray(value)) {
        masked[key] = value.map((item: unknown) => this.maskValue(key, item));
      } else {
        masked[key] = this.maskValue(key, value);
      }
    }

    return masked;
  }

  private maskValue(key: string, value: unknown): unknown {
    if (typeof value === 'object' && value !== null) {
      return this.maskObject(value);
    }
    if (typeof value === 'bigint') {
      return value.toString();
    }
    const byField = this.maskField(key, value);
    return typeof byField === 'string' ? this.maskText(byField) : byField;
  }

  private maskTaxId(value: string): string {
    const cleaned = cleanValue(value);

    if (cleaned.length < MIN_LENGTH_FOR_PARTIAL_MASK) {
      return FULL_MASK;
    }

    return `${TAX_ID_MASK_PREFIX}${extractLastN(cleaned, VISIBLE_LAST_CHARS)}`;
  }

  private maskAccountNumber(value: string): string {
    const cleaned = cleanValue(value);

    if (cleaned.length < MIN_LENGTH_FOR_PARTIAL_MASK) {
      return FULL_MASK;
    }

    return `${ACCOUNT_MASK_PREFIX}${extractLastN(cleaned, VISIBLE_LAST_CHARS)}`;
  }

  maskText(text: string): string {
    let masked = text;

    masked = masked.replace(IBAN_PATTERN, (match) => this.maskAccountNumber(match));
    masked = masked.replace(NRB_PATTERN, (match) => this.maskAccountNumber(match));
    masked = masked.replace(NIP_PATTERN, (match) => this.maskTaxId(match));
    masked = masked.replace(EMAIL_PATTERN, EMAIL_MASK_REPLACEMENT);

    return masked;
  }

  shouldMask(fieldName: string): boolean {
    return matchesAny(fieldName.toLowerCase(), SENSITIVE_FIELDS);
  }
}

let piiMasker: PIIMasker | null = null;

export function getPIIMasker(): PIIMasker {
  if (!piiMasker) {
    piiMasker = new PIIMasker();
  }
  return piiMasker;
}
