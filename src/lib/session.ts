import {
  GetCallerIdentityCommand,
  type GetCallerIdentityCommandOutput,
} from "@aws-sdk/client-sts";
import { fromIni, fromNodeProviderChain } from "@aws-sdk/credential-providers";
import type { AwsCredentialIdentityProvider } from "@aws-sdk/types";
import { getSTSClient } from "./aws-clients.js";
import type { Identity } from "../types.js";

/**
 * Error name the SDK credential providers use when no source yields credentials.
 */
const CREDENTIALS_PROVIDER_ERROR = "CredentialsProviderError";

/**
 * Explicit credential configuration for a report run.
 */
export interface SessionConfig {
  /**
   * Region used for region-agnostic calls (STS, DescribeRegions).
   */
  metadataRegion: string;

  /**
   * Named profile from the shared config/credentials files, given with `--profile`.
   */
  profile?: string;

  /**
   * Credential provider to use instead of the SDK resolution chain.
   */
  credentials?: AwsCredentialIdentityProvider;
}

/**
 * Authenticated session handle passed to every collector.
 */
export interface Session {
  readonly credentials: AwsCredentialIdentityProvider;
  readonly metadataRegion: string;
}

/**
 * Thrown when no credential source is configured.
 */
export class CredentialsNotFoundError extends Error {
  constructor(options?: { cause?: unknown }) {
    super("AWS credentials not found", options);
    this.name = "CredentialsNotFoundError";
  }
}

/**
 * Builds a session from explicit configuration.
 *
 * Credential resolution order:
 * 1. `config.credentials` when given
 * 2. the named profile via `fromIni` when `config.profile` is set
 * 3. the SDK's default Node chain (environment, `AWS_PROFILE` and shared files, SSO,
 *    instance and container roles)
 *
 * No credentials are fetched here; the first request resolves them.
 *
 * @example
 * ```typescript
 * const session = createSession({ metadataRegion: "us-east-1", profile: "billing" });
 * const identity = await resolveIdentity(session);
 * ```
 */
export function createSession(config: SessionConfig): Session {
  let credentials: AwsCredentialIdentityProvider;

  if (config.credentials) {
    credentials = config.credentials;
  } else if (config.profile) {
    credentials = fromIni({ profile: config.profile });
  } else {
    credentials = fromNodeProviderChain();
  }

  return {
    credentials,
    metadataRegion: config.metadataRegion,
  };
}

/**
 * Checks whether an error comes from the SDK failing to find credentials.
 */
export function isCredentialsError(error: unknown): boolean {
  return error instanceof Error && error.name === CREDENTIALS_PROVIDER_ERROR;
}

/**
 * Looks up the account behind the session's credentials with STS GetCallerIdentity.
 *
 * @returns The caller's account id
 *
 * @throws {CredentialsNotFoundError} If no credentials could be resolved
 * @throws {Error} If STS fails or returns no account id
 */
export async function resolveIdentity(session: Session): Promise<Identity> {
  const sts = getSTSClient({
    region: session.metadataRegion,
    credentials: session.credentials,
  });

  let response: GetCallerIdentityCommandOutput;
  try {
    response = await sts.send(new GetCallerIdentityCommand({}));
  } catch (error) {
    if (isCredentialsError(error)) {
      throw new CredentialsNotFoundError({ cause: error });
    }
    throw error;
  }

  if (!response.Account) {
    throw new Error("STS GetCallerIdentity returned no account id");
  }

  return { accountId: response.Account };
}
