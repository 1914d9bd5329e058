// File: src/utils/clients.ts
// Client creation utilities

import { Organizations, OrganizationsClientConfig } from '@aws-sdk/client-organizations'
import { EC2Client, EC2ClientConfig } from '@aws-sdk/client-ec2'
import { STSClient, STSClientConfig } from '@aws-sdk/client-sts'
import { S3Client, S3ClientConfig } from '@aws-sdk/client-s3'
import {
  ElasticLoadBalancingV2Client,
  ElasticLoadBalancingV2ClientConfig,
} from '@aws-sdk/client-elastic-load-balancing-v2'
import { fromIni } from '@aws-sdk/credential-providers'
import { RoleCredentials } from '../types'
import { DEFAULT_REGION } from '../config/constants'

/**
 * Create an AWS Organizations client
 */
export function createOrganizationsClient(profile?: string): Organizations {
  const clientConfig: OrganizationsClientConfig = {
    region: DEFAULT_REGION, // Organizations API is global, but requires a region
  }

  // If profile is specified, use credentials from profile
  if (profile) {
    clientConfig.credentials = fromIni({ profile })
  }

  return new Organizations(clientConfig)
}

/**
 * Create an STS client
 */
export function createSTSClient(profile?: string): STSClient {
  const clientConfig: STSClientConfig = {
    region: DEFAULT_REGION,
  }

  if (profile) {
    clientConfig.credentials = fromIni({ profile })
  }

  return new STSClient(clientConfig)
}

/**
 * Create an EC2 client
 * @param region AWS region
 * @param credentials Role credentials (if null, use current credentials)
 * @param profile Profile to load current credentials from
 */
export function createEC2Client(region: string, credentials: RoleCredentials | null, profile?: string): EC2Client {
  const config: EC2ClientConfig = { region }

  if (credentials) {
    config.credentials = {
      accessKeyId: credentials.accessKeyId,
      secretAccessKey: credentials.secretAccessKey,
      sessionToken: credentials.sessionToken,
    }
  } else if (profile) {
    config.credentials = fromIni({ profile })
  }

  return new EC2Client(config)
}

/**
 * Create an ELBv2 client (ALB/NLB/GWLB)
 * @param region AWS region
 * @param credentials Role credentials
 */
export function createELBv2Client(region: string, credentials: RoleCredentials): ElasticLoadBalancingV2Client {
  const config: ElasticLoadBalancingV2ClientConfig = {
    region,
    credentials: {
      accessKeyId: credentials.accessKeyId,
      secretAccessKey: credentials.secretAccessKey,
      sessionToken: credentials.sessionToken,
    },
  }
  return new ElasticLoadBalancingV2Client(config)
}

/**
 * Create an S3 client using current credentials
 *
 * Redirects are followed so a bucket in another region than the client's still accepts writes.
 * @param profile Profile to load current credentials from
 * @param region Region of the bucket, when known
 */
export function createS3Client(profile?: string, region = DEFAULT_REGION): S3Client {
  const config: S3ClientConfig = { region, followRegionRedirects: true }

  if (profile) {
    config.credentials = fromIni({ profile })
  }

  return new S3Client(config)
}

/**
 * Assumed-role credentials bound to a single region
 *
 * Clients are created on first use and shared for the lifetime of the session.
 * Call destroy() (or use withRegionSession) once the region has been processed
 * so that the clients' sockets are released.
 */
export class RegionSession {
  private ec2Client?: EC2Client
  private elbv2Client?: ElasticLoadBalancingV2Client

  constructor(
    readonly region: string,
    private readonly credentials: RoleCredentials,
  ) {}

  ec2(): EC2Client {
    if (!this.ec2Client) {
      this.ec2Client = createEC2Client(this.region, this.credentials)
    }
    return this.ec2Client
  }

  elbv2(): ElasticLoadBalancingV2Client {
    if (!this.elbv2Client) {
      this.elbv2Client = createELBv2Client(this.region, this.credentials)
    }
    return this.elbv2Client
  }

  destroy(): void {
    this.ec2Client?.destroy()
    this.elbv2Client?.destroy()
    this.ec2Client = undefined
    this.elbv2Client = undefined
  }
}

/**
 * Run fn with a region session, destroying the session however fn completes
 */
export async function withRegionSession<T>(
  region: string,
  credentials: RoleCredentials,
  fn: (session: RegionSession) => Promise<T>,
): Promise<T> {
  const session = new RegionSession(region, credentials)
  try {
    return await fn(session)
  } finally {
    session.destroy()
  }
}
