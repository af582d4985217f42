import * as fs from 'fs';
import { CREDENTIAL_FIELDS, CredentialField, Credentials } from './types';
import { getErrorMessage } from './log';

export class CredentialsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CredentialsError';
  }
}

export function missingCredentialFields(value: unknown): CredentialField[] {
  if (typeof value !== 'object' || value === null) return [...CREDENTIAL_FIELDS];
  const record: Record<string, unknown> = { ...value };
  return CREDENTIAL_FIELDS.filter(field => {
    const secret = record[field];
    return typeof secret !== 'string' || secret.length === 0;
  });
}

/**
 * Read the posting credentials file. Throws CredentialsError when the file is missing,
 * is not JSON, or lacks any of the four fields. Secret values never appear in messages.
 */
export function loadCredentials(credsPath: string): Credentials {
  if (!fs.existsSync(credsPath)) {
    throw new CredentialsError(`Credentials file does not exist: ${credsPath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(credsPath, 'utf8'));
  } catch (err) {
    throw new CredentialsError(`Invalid JSON in credentials file: ${getErrorMessage(err)}`);
  }

  const missing = missingCredentialFields(parsed);
  if (missing.length > 0 || typeof parsed !== 'object' || parsed === null) {
    throw new CredentialsError(`Missing required credentials: ${missing.join(', ')}`);
  }

  const record: Record<string, unknown> = { ...parsed };
  const read = (field: CredentialField): string => String(record[field]);
  return {
    'Consumer Key': read('Consumer Key'),
    'Consumer Secret': read('Consumer Secret'),
    'Access Token': read('Access Token'),
    'Access Token Secret': read('Access Token Secret'),
  };
}
