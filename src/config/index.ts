/**
 * SES Configuration Module
 *
 * Configuration values, the fluent builder and environment loading for the
 * SES client. A configuration is validated once, frozen, and then passed
 * explicitly to every client; there is no process-wide default.
 *
 * @module config
 */

import { z } from 'zod';
import { configurationError } from '../error/index.js';
import type { AwsCredentials, SignatureVersion } from '../signing/types.js';

/**
 * Package version reported in the user agent.
 */
export const VERSION = '0.1.0';

/**
 * Credential scope service of the SES query API.
 */
export const DEFAULT_SERVICE = 'email';

/**
 * Signing scheme used unless configured otherwise.
 */
export const DEFAULT_SIGNATURE_VERSION: SignatureVersion = 'v4';

const BASE_USER_AGENT = `ses-query-mailer/${VERSION}`;

/**
 * SES client configuration.
 *
 * @example
 * ```typescript
 * const config: SesConfig = {
 *   region: 'us-east-1',
 *   endpoint: 'https://email.us-east-1.amazonaws.com',
 *   credentials: { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' },
 *   signatureVersion: 'v4',
 *   service: 'email',
 *   userAgent: 'ses-query-mailer/0.1.0',
 * };
 * ```
 */
export interface SesConfig {
  /** AWS region, part of the SigV4 credential scope. */
  readonly region: string;
  /** Endpoint URL requests are posted to. */
  readonly endpoint: string;
  /** Static credentials. */
  readonly credentials: AwsCredentials;
  /** Signing scheme. */
  readonly signatureVersion: SignatureVersion;
  /** SigV4 scope service identifier. */
  readonly service: string;
  /** Value of the `user-agent` header. */
  readonly userAgent: string;
}

const configSchema = z.object({
  region: z.string().min(1),
  endpoint: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), { message: 'Endpoint must be an http(s) URL' }),
  credentials: z.object({
    accessKeyId: z.string().min(1),
    secretAccessKey: z.string().min(1),
  }),
  signatureVersion: z.enum(['v4', 'v3']),
  service: z.string().min(1),
  userAgent: z.string().min(1),
});

/**
 * Validate a configuration and return a frozen copy.
 *
 * @throws {ConstructionError} With code `CONFIGURATION` listing every issue
 */
export function validateConfig(config: unknown): SesConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw configurationError(`Invalid configuration: ${issues.join(', ')}`);
  }

  const { credentials, ...rest } = result.data;
  return Object.freeze({ ...rest, credentials: Object.freeze({ ...credentials }) });
}

/**
 * Standard SES query endpoint of a region.
 *
 * @example
 * ```typescript
 * resolveEndpoint('eu-west-1'); // 'https://email.eu-west-1.amazonaws.com'
 * ```
 */
export function resolveEndpoint(region: string): string {
  return `https://email.${region}.amazonaws.com`;
}

/**
 * Build the user agent, appending an optional suffix to the package's own.
 */
export function buildUserAgent(suffix?: string): string {
  return suffix ? `${BASE_USER_AGENT} ${suffix}` : BASE_USER_AGENT;
}

/**
 * Values collected by the builder before validation.
 */
interface ConfigDraft {
  region?: string;
  endpoint?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  signatureVersion?: string;
  service?: string;
  userAgent?: string;
}

/**
 * SES configuration builder.
 *
 * @example
 * ```typescript
 * const config = new SesConfigBuilder()
 *   .region('us-east-1')
 *   .credentials('test-access-key', 'test-secret')
 *   .signatureVersion('v3')
 *   .build();
 * ```
 */
export class SesConfigBuilder {
  private draft: ConfigDraft = {};

  /**
   * Set the AWS region.
   */
  region(region: string): this {
    this.draft = { ...this.draft, region };
    return this;
  }

  /**
   * Set a custom endpoint URL. Defaults to the regional SES endpoint.
   *
   * @example
   * builder.endpoint('http://localhost:4566')
   */
  endpoint(endpoint: string): this {
    this.draft = { ...this.draft, endpoint };
    return this;
  }

  /**
   * Set static credentials.
   */
  credentials(accessKeyId: string, secretAccessKey: string): this {
    this.draft = { ...this.draft, accessKeyId, secretAccessKey };
    return this;
  }

  /**
   * Select the signing scheme.
   */
  signatureVersion(version: SignatureVersion): this {
    this.draft = { ...this.draft, signatureVersion: version };
    return this;
  }

  /**
   * Override the SigV4 scope service identifier.
   */
  service(service: string): this {
    this.draft = { ...this.draft, service };
    return this;
  }

  /**
   * Set a suffix appended to the user agent.
   */
  userAgent(suffix: string): this {
    this.draft = { ...this.draft, userAgent: suffix };
    return this;
  }

  /**
   * Load values from environment variables. Unset or empty variables leave
   * the current value in place.
   *
   * - `AWS_ACCESS_KEY_ID`
   * - `AWS_SECRET_ACCESS_KEY` or `AWS_SECRET_KEY`
   * - `AWS_REGION` or `AWS_DEFAULT_REGION`
   * - `AWS_SES_ENDPOINT` or `AWS_ENDPOINT_URL_SES`
   * - `AWS_SES_SIGNATURE_VERSION`
   * - `AWS_USER_AGENT`
   */
  fromEnv(env: NodeJS.ProcessEnv = process.env): this {
    const pick = (...names: string[]): string | undefined =>
      names.map((name) => env[name]).find((value) => value !== undefined && value !== '');

    const loaded: ConfigDraft = {
      accessKeyId: pick('AWS_ACCESS_KEY_ID'),
      secretAccessKey: pick('AWS_SECRET_ACCESS_KEY', 'AWS_SECRET_KEY'),
      region: pick('AWS_REGION', 'AWS_DEFAULT_REGION'),
      endpoint: pick('AWS_SES_ENDPOINT', 'AWS_ENDPOINT_URL_SES'),
      signatureVersion: pick('AWS_SES_SIGNATURE_VERSION'),
      userAgent: pick('AWS_USER_AGENT'),
    };

    for (const [key, value] of Object.entries(loaded)) {
      if (value !== undefined) {
        this.draft = { ...this.draft, [key]: value };
      }
    }
    return this;
  }

  /**
   * Build and validate the configuration.
   *
   * @throws {ConstructionError} If a value is missing or invalid
   */
  build(): SesConfig {
    const { region, endpoint, accessKeyId, secretAccessKey } = this.draft;

    return validateConfig({
      region,
      endpoint: endpoint ?? (region ? resolveEndpoint(region) : undefined),
      credentials:
        accessKeyId === undefined && secretAccessKey === undefined
          ? undefined
          : { accessKeyId, secretAccessKey },
      signatureVersion: this.draft.signatureVersion ?? DEFAULT_SIGNATURE_VERSION,
      service: this.draft.service ?? DEFAULT_SERVICE,
      userAgent: buildUserAgent(this.draft.userAgent),
    });
  }
}

/**
 * Create a new SES config builder.
 */
export function configBuilder(): SesConfigBuilder {
  return new SesConfigBuilder();
}
