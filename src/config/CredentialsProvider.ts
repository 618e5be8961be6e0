// src/config/CredentialsProvider.ts

import { MissingApiKeyError, MissingApplicationIdError } from '../utils/errors';

export interface Credentials {
  applicationId: string;
  apiKey: string;
}

/**
 * Source of credentials. The dispatcher asks for them on every attempt, so a
 * provider backed by a mutable store picks up rotated keys mid-retry.
 */
export interface CredentialsProvider {
  current(): Credentials;
}

export const APPLICATION_ID_ENV = 'ALGOLIA_APPLICATION_ID';
export const API_KEY_ENV = 'ALGOLIA_API_KEY';

export class StaticCredentialsProvider implements CredentialsProvider {
  private readonly credentials: Credentials;

  constructor(credentials: Credentials) {
    if (!credentials.applicationId) throw new MissingApplicationIdError();
    if (!credentials.apiKey) throw new MissingApiKeyError();
    this.credentials = { ...credentials };
  }

  current(): Credentials {
    return this.credentials;
  }
}

/**
 * Environment variables win over configured values, matching how the
 * service's other clients resolve them.
 */
export class EnvCredentialsProvider implements CredentialsProvider {
  constructor(
    private fallback: Partial<Credentials> = {},
    private env: NodeJS.ProcessEnv = process.env
  ) {}

  current(): Credentials {
    const applicationId = this.env[APPLICATION_ID_ENV] || this.fallback.applicationId;
    if (!applicationId) {
      throw new MissingApplicationIdError();
    }

    const apiKey = this.env[API_KEY_ENV] || this.fallback.apiKey;
    if (!apiKey) {
      throw new MissingApiKeyError();
    }

    return { applicationId, apiKey };
  }
}
