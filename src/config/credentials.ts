/**
 * Credential settings
 *
 * At most one credential source may be configured. When none is, the
 * driver falls back to application default credentials.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ERROR_MESSAGES, extractErrorMessage, type MultiError } from '@/lib/errors';
import type { DecodedFields } from '@/lib/decode';

export interface CredentialsConfig {
  accessToken: string;
  credentialsFile: string;
  credentialsJSON: string;
  impersonateServiceAccount: string;
  vaultGCPOauthEngine: string;
}

export const credentialsFieldSchemas = {
  access_token: z.string(),
  credentials_file: z.string(),
  credentials_json: z.string(),
  impersonate_service_account: z.string(),
  vault_gcp_oauth_engine: z.string(),
};

export type CredentialsFields = DecodedFields<typeof credentialsFieldSchemas>;

/** Keys a service account or authorized-user key file must carry */
const credentialsDocumentSchema = z
  .object({
    type: z.string().min(1, 'missing "type"'),
  })
  .passthrough();

function checkCredentialsDocument(key: string, text: string, errors: MultiError): void {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    errors.append(ERROR_MESSAGES.INVALID_VALUE(key, `not valid JSON: ${extractErrorMessage(error)}`));
    return;
  }
  const parsed = credentialsDocumentSchema.safeParse(document);
  if (!parsed.success) {
    const reason = parsed.error.issues.map((issue) => issue.message).join(', ');
    errors.append(ERROR_MESSAGES.INVALID_VALUE(key, `not a credentials document (${reason})`));
  }
}

/**
 * Validate the credential source and read key files
 */
export function prepareCredentials(fields: CredentialsFields, errors: MultiError): CredentialsConfig {
  const creds: CredentialsConfig = {
    accessToken: fields.access_token ?? '',
    credentialsFile: fields.credentials_file ?? '',
    credentialsJSON: fields.credentials_json ?? '',
    impersonateServiceAccount: fields.impersonate_service_account ?? '',
    vaultGCPOauthEngine: fields.vault_gcp_oauth_engine ?? '',
  };

  const sources: Array<[string, string]> = [
    ['credentials_file', creds.credentialsFile],
    ['credentials_json', creds.credentialsJSON],
    ['access_token', creds.accessToken],
    ['vault_gcp_oauth_engine', creds.vaultGCPOauthEngine],
  ];
  const configured = sources.filter(([, value]) => value !== '').map(([key]) => key);
  if (configured.length > 1) {
    errors.append(ERROR_MESSAGES.MUTUALLY_EXCLUSIVE(configured));
  }

  if (creds.credentialsFile !== '') {
    try {
      checkCredentialsDocument(
        'credentials_file',
        readFileSync(creds.credentialsFile, 'utf-8'),
        errors,
      );
    } catch (error) {
      errors.append(
        ERROR_MESSAGES.FILE_UNREADABLE(
          'credentials_file',
          creds.credentialsFile,
          extractErrorMessage(error),
        ),
      );
    }
  }

  if (creds.credentialsJSON !== '') {
    checkCredentialsDocument('credentials_json', creds.credentialsJSON, errors);
  }

  return creds;
}
