export interface Credential {
  id: string;
  name: string;
  type: string;
  createdAt?: string;
  updatedAt?: string;
  [key: string]: unknown;
}

export interface CredentialList {
  data: Credential[];
  nextCursor?: string | null;
}

/** `name`, `type` and `data` (the secret fields for the credential type) */
export type CredentialInput = Record<string, unknown>;

export type CredentialSchema = Record<string, unknown>;
