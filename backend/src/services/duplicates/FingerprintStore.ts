import { all, run } from '../../db/connection';
import type { DuplicateKey } from '@template-extract/shared/schemas/extractionResult.zod';

export interface FingerprintRecord {
  id: number;
  fingerprint: string;
  canonical: string;
  template_id: string;
  document_ref: string | null;
  recorded_at: string;
}

export interface RecordOutcome {
  record: FingerprintRecord;
  duplicates: FingerprintRecord[];
}

/**
 * Registry of fingerprints already seen, backed by the `fingerprints` table.
 */
export class FingerprintStore {
  async findByKey(fingerprint: string): Promise<FingerprintRecord[]> {
    return all<FingerprintRecord>(
      'SELECT id, fingerprint, canonical, template_id, document_ref, recorded_at FROM fingerprints WHERE fingerprint = ? ORDER BY id',
      [fingerprint]
    );
  }

  /**
   * Stores the key and returns the earlier documents that carried it.
   */
  async record(key: DuplicateKey, templateId: string, documentRef: string | null, recordedAt = new Date()): Promise<RecordOutcome> {
    const duplicates = await this.findByKey(key.key);
    const recorded_at = recordedAt.toISOString();

    const { lastID } = await run(
      'INSERT INTO fingerprints (fingerprint, canonical, template_id, document_ref, recorded_at) VALUES (?, ?, ?, ?, ?)',
      [key.key, key.canonical, templateId, documentRef, recorded_at]
    );

    return {
      record: {
        id: lastID,
        fingerprint: key.key,
        canonical: key.canonical,
        template_id: templateId,
        document_ref: documentRef,
        recorded_at,
      },
      duplicates,
    };
  }

  async count(): Promise<number> {
    const rows = await all<{ total: number }>('SELECT COUNT(*) AS total FROM fingerprints');
    return rows[0]?.total ?? 0;
  }
}
