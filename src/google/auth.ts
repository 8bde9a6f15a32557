import { readFileSync } from 'fs';
import { google, type drive_v3, type sheets_v4 } from 'googleapis';
import { JWT } from 'google-auth-library';
import { z } from 'zod';

const serviceAccountKeySchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

type ServiceAccountKey = z.infer<typeof serviceAccountKeySchema>;

export const AUDIT_SCOPES = [
  'https://www.googleapis.com/auth/drive',
  'https://www.googleapis.com/auth/spreadsheets',
];

let authClient: { credentialsPath: string; client: JWT } | null = null;

function readServiceAccountKey(credentialsPath: string): ServiceAccountKey {
  let raw: string;
  try {
    raw = readFileSync(credentialsPath, 'utf-8');
  } catch (error) {
    throw new Error(`Cannot read credentials file ${credentialsPath}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Credentials file ${credentialsPath} is not valid JSON`, { cause: error });
  }

  const result = serviceAccountKeySchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Credentials file ${credentialsPath} is missing required fields`);
  }
  return result.data;
}

function normalizePrivateKey(key: string): string {
  return key.replace(/\\n/g, '\n');
}

export function getAuthClient(credentialsPath: string): JWT {
  if (authClient?.credentialsPath === credentialsPath) {
    return authClient.client;
  }

  const credentials = readServiceAccountKey(credentialsPath);
  const client = new JWT({
    email: credentials.client_email,
    key: normalizePrivateKey(credentials.private_key),
    scopes: AUDIT_SCOPES,
  });

  authClient = { credentialsPath, client };
  return client;
}

export function getSheetsClient(credentialsPath: string): sheets_v4.Sheets {
  const auth = getAuthClient(credentialsPath);
  return google.sheets({ version: 'v4', auth });
}

export function getDriveClient(credentialsPath: string): drive_v3.Drive {
  const auth = getAuthClient(credentialsPath);
  return google.drive({ version: 'v3', auth });
}

export function __resetAuthClientForTests(): void {
  authClient = null;
}
