export type Issue = {
  // API identity URL; the only key used for deduplication
  url: string;
  title: string;
  created_at: string;
  updated_at: string;
  repository_url: string;
  html_url?: string;
  // Top repository languages by byte count, set by enrichment only
  languages?: Record<string, number>;
};

export type PublishOutcome = {
  error: string | null;
  text: string;
  issueUrl: string;
};

export const CREDENTIAL_FIELDS = [
  'Consumer Key',
  'Consumer Secret',
  'Access Token',
  'Access Token Secret',
] as const;

export type CredentialField = (typeof CREDENTIAL_FIELDS)[number];

export type Credentials = Record<CredentialField, string>;

export type Config = {
  labels: string[];
  token?: string;
  dbPath: string;
  create: boolean;
  credentialsPath: string;
  dryRun: boolean;
  onlySave: boolean;
  maxAgeDays: number;
  maxHistory: number;
};

export type Sleep = (ms: number) => Promise<void>;
