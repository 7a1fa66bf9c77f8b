import crypto from 'crypto';
import type {
  ExtractionResult,
  FingerprintComponent,
  FingerprintOutcome,
} from '@template-extract/shared/schemas/extractionResult.zod';
import { DEFAULT_FINGERPRINT_FIELDS } from '../../utils/config';
import type { FingerprintFieldNames } from '../../utils/config';

const COMPONENT_SEPARATOR = '|';
const HASH_ALGORITHM = 'sha256';
const NON_ALPHANUMERIC = /[^A-Z0-9]/g;
const COUNTRY_PREFIXED_ID = /^[A-Z]{2}(\d+)$/;
const INNER_WHITESPACE = /\s+/g;

export function normalizeFiscalIdComponent(value: string): string {
  const compact = value.toUpperCase().replace(NON_ALPHANUMERIC, '');
  const prefixed = COUNTRY_PREFIXED_ID.exec(compact);
  return prefixed ? prefixed[1] : compact;
}

export function normalizeDocumentNumber(value: string): string {
  return value.trim().replace(INNER_WHITESPACE, ' ').toUpperCase();
}

/**
 * Derives the duplicate key of an extraction result from the issuer fiscal
 * id, document number, document date and gross amount. The same four values
 * always give the same key, whichever template extracted them.
 */
export class Fingerprinter {
  constructor(private readonly fieldNames: FingerprintFieldNames = DEFAULT_FINGERPRINT_FIELDS) {}

  fingerprint(result: ExtractionResult): FingerprintOutcome {
    const fiscalId = this.readText(result, this.fieldNames.fiscalId);
    const documentNumber = this.readText(result, this.fieldNames.documentNumber);
    const documentDate = this.readDate(result, this.fieldNames.documentDate);
    const grossAmount = this.readAmount(result, this.fieldNames.grossAmount);

    const normalizedFiscalId = fiscalId === null ? '' : normalizeFiscalIdComponent(fiscalId);
    const normalizedNumber = documentNumber === null ? '' : normalizeDocumentNumber(documentNumber);

    const missing: FingerprintComponent[] = [];
    if (normalizedFiscalId === '') {
      missing.push('fiscal_id');
    }
    if (normalizedNumber === '') {
      missing.push('document_number');
    }
    if (documentDate === null) {
      missing.push('document_date');
    }
    if (grossAmount === null) {
      missing.push('gross_amount');
    }

    if (missing.length > 0 || documentDate === null || grossAmount === null) {
      return { status: 'incomplete', missing };
    }

    const canonical = [normalizedFiscalId, normalizedNumber, documentDate, grossAmount].join(COMPONENT_SEPARATOR);

    return {
      status: 'complete',
      key: crypto.createHash(HASH_ALGORITHM).update(canonical, 'utf8').digest('hex'),
      canonical,
      components: {
        fiscal_id: normalizedFiscalId,
        document_number: normalizedNumber,
        document_date: documentDate,
        gross_amount: grossAmount,
      },
    };
  }

  private readText(result: ExtractionResult, fieldName: string): string | null {
    const value = result.fields[fieldName];
    if (!value) {
      return null;
    }
    return value.type === 'text' || value.type === 'integer' ? String(value.value) : null;
  }

  private readDate(result: ExtractionResult, fieldName: string): string | null {
    const value = result.fields[fieldName];
    return value && value.type === 'date' ? value.value : null;
  }

  private readAmount(result: ExtractionResult, fieldName: string): string | null {
    const value = result.fields[fieldName];
    return value && value.type === 'amount' ? value.value : null;
  }
}
