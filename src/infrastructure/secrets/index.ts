/**
 * Secret lookup
 *
 * Secrets come from Google Secret Manager or from environment variables.
 * Successful lookups are memoized for the life of the process; failed ones
 * are retried on the next call.
 */

import { SecretManagerServiceClient } from '@google-cloud/secret-manager';
import type { Logger } from 'pino';
import { SecretNotFoundError, errorMessage, toError } from '../../lib/errors';

export interface SecretProvider {
  getSecret(name: string): Promise<string>;
}

/**
 * `gemini-api-key` -> `GEMINI_API_KEY`
 */
export function secretEnvName(name: string): string {
  return name.toUpperCase().replace(/[^A-Z0-9]/g, '_');
}

export class EnvSecretProvider implements SecretProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async getSecret(name: string): Promise<string> {
    const value = this.env[secretEnvName(name)]?.trim();
    if (!value) {
      throw new SecretNotFoundError(name);
    }
    return value;
  }
}

/**
 * Subset of SecretManagerServiceClient the provider calls
 */
export interface SecretManagerLike {
  getProjectId(): Promise<string>;
  accessSecretVersion(request: { name: string }): Promise<
    [{ payload?: { data?: Uint8Array | string | null } | null }, ...unknown[]]
  >;
}

let sharedClient: SecretManagerLike | undefined;

/**
 * Process-wide Secret Manager client, created on first use
 */
export function getSecretManagerClient(): SecretManagerLike {
  sharedClient ??= new SecretManagerServiceClient();
  return sharedClient;
}

export interface GcpSecretProviderOptions {
  projectId?: string;
  client?: SecretManagerLike;
}

export class GcpSecretProvider implements SecretProvider {
  constructor(private readonly options: GcpSecretProviderOptions = {}) {}

  async getSecret(name: string): Promise<string> {
    const client = this.options.client ?? getSecretManagerClient();
    try {
      const projectId = this.options.projectId ?? (await client.getProjectId());
      const [version] = await client.accessSecretVersion({
        name: `projects/${projectId}/secrets/${name}/versions/latest`,
      });
      const data = version.payload?.data;
      if (data === undefined || data === null) {
        throw new Error('secret version has no payload');
      }
      return typeof data === 'string' ? data : Buffer.from(data).toString('utf-8');
    } catch (error) {
      throw new SecretNotFoundError(name, toError(error));
    }
  }
}

/**
 * Memoizes another provider; concurrent lookups of one name share a request
 */
export class CachedSecretProvider implements SecretProvider {
  private readonly secrets = new Map<string, Promise<string>>();
  private readonly logger: Logger;

  constructor(
    private readonly inner: SecretProvider,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'SecretProvider' });
  }

  getSecret(name: string): Promise<string> {
    const cached = this.secrets.get(name);
    if (cached) {
      return cached;
    }

    const pending = this.inner.getSecret(name).catch((error: unknown) => {
      this.secrets.delete(name);
      this.logger.warn({ secret: name, error: errorMessage(error) }, 'Secret lookup failed');
      throw error;
    });
    this.secrets.set(name, pending);
    return pending;
  }
}

export function createSecretProvider(
  backend: 'env' | 'gcp',
  logger: Logger,
  options: GcpSecretProviderOptions = {},
): SecretProvider {
  const inner = backend === 'gcp' ? new GcpSecretProvider(options) : new EnvSecretProvider();
  return new CachedSecretProvider(inner, logger);
}
