/**
 * Customer-supplied disk encryption key reference
 */

import { z } from 'zod';
import { strictRecord } from '@/lib/decode';

/**
 * `kmsKeyName` names a Cloud KMS key; `rawKey` is a base64 AES-256 key.
 * Sub-keys are matched case-insensitively; anything else is rejected.
 */
export const diskEncryptionKeySchema = strictRecord({
  kmsKeyName: z.string().optional(),
  rawKey: z.string().optional(),
});

export type DiskEncryptionKey = z.output<typeof diskEncryptionKeySchema>;
