import type { AwsCredentialIdentityProvider } from "@aws-sdk/types";
import { EC2Client, type EC2ClientConfig } from "@aws-sdk/client-ec2";
import { RDSClient, type RDSClientConfig } from "@aws-sdk/client-rds";
import {
  SavingsplansClient,
  type SavingsplansClientConfig,
} from "@aws-sdk/client-savingsplans";
import { STSClient, type STSClientConfig } from "@aws-sdk/client-sts";

/**
 * Configuration shared by every client factory.
 *
 * Clients are created per call and never cached: the report makes one
 * request per client and the run is strictly sequential.
 */
export interface ClientConfig {
  /**
   * AWS region the client sends requests to.
   */
  region: string;

  /**
   * Credential provider built by the session.
   */
  credentials: AwsCredentialIdentityProvider;
}

/**
 * Creates an EC2 client for the given region.
 *
 * @example
 * ```typescript
 * const ec2 = getEC2Client({ region: "eu-west-1", credentials: session.credentials });
 * const { ReservedInstances } = await ec2.send(new DescribeReservedInstancesCommand({}));
 * ```
 */
export function getEC2Client(config: ClientConfig): EC2Client {
  const clientConfig: EC2ClientConfig = {
    region: config.region,
    credentials: config.credentials,
  };

  return new EC2Client(clientConfig);
}

/**
 * Creates an RDS client for the given region.
 */
export function getRDSClient(config: ClientConfig): RDSClient {
  const clientConfig: RDSClientConfig = {
    region: config.region,
    credentials: config.credentials,
  };

  return new RDSClient(clientConfig);
}

/**
 * Creates a Savings Plans client for the given region.
 *
 * Savings Plans is a global service; the client still takes the scanned
 * region so that each region is queried the same way as EC2 and RDS.
 */
export function getSavingsPlansClient(
  config: ClientConfig
): SavingsplansClient {
  const clientConfig: SavingsplansClientConfig = {
    region: config.region,
    credentials: config.credentials,
  };

  return new SavingsplansClient(clientConfig);
}

/**
 * Creates an STS (Security Token Service) client.
 */
export function getSTSClient(config: ClientConfig): STSClient {
  const clientConfig: STSClientConfig = {
    region: config.region,
    credentials: config.credentials,
  };

  return new STSClient(clientConfig);
}
