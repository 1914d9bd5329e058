// File: src/types/index.ts
// Central location for shared types
import {
  NetworkAcl,
  RouteTable,
  SecurityGroup,
  Subnet,
  Vpc,
  VpcEndpoint,
  VpcPeeringConnection,
} from '@aws-sdk/client-ec2'
import { LoadBalancer } from '@aws-sdk/client-elastic-load-balancing-v2'

// Temporary credentials obtained by assuming a role in a member account
export interface RoleCredentials {
  accessKeyId: string
  secretAccessKey: string
  sessionToken: string
}

// Account found while walking the organization tree
export interface OrganizationAccount {
  Id: string
  Name?: string
  Email?: string
  Status?: string
  ParentId: string // Root or OU the account sits directly under
}

// Networking resources of one region, as returned by the AWS APIs
// Key order here is the key order of the stored JSON document
export interface RegionDocumentation {
  vpcs: Vpc[]
  subnets: Subnet[]
  security_groups: SecurityGroup[]
  network_acls: NetworkAcl[]
  route_tables: RouteTable[]
  vpc_endpoints: VpcEndpoint[]
  vpc_peering_connections: VpcPeeringConnection[]
  load_balancers: LoadBalancer[]
}

// region code -> resources
export type AccountDocumentation = Record<string, RegionDocumentation>

// account id -> region code -> resources
export type Documentation = Record<string, AccountDocumentation>

// One page of a paginated describe/list call
export interface ResourcePage<T> {
  items?: T[]
  nextToken?: string
}

// Where the documentation object is written
export interface DocumentationLocation {
  bucket: string
  key: string
}

export interface StoredDocumentation extends DocumentationLocation {
  bytes: number
}

// Command options shared across commands
export interface BaseCommandOptions {
  profile?: string
  output?: string
}

export interface DocumentCommandOptions extends BaseCommandOptions {
  roleName: string
  bucket: string
  key: string
  bucketRegion?: string
  region?: string[]
  accountId?: string
}

// Options the documentation pipeline runs with
export interface DocumentationOptions {
  profile?: string
  roleName: string
  bucket: string
  key: string
  bucketRegion?: string // Region of the bucket, defaults to DEFAULT_REGION
  regions?: string[] // Skip region discovery when given
  accountId?: string // Document a single account instead of walking the organization
}

// Resource counts for one account/region, used in command summaries
export interface RegionSummary {
  AccountId: string
  Region: string
  VPCs: number
  Subnets: number
  SecurityGroups: number
  NetworkACLs: number
  RouteTables: number
  VPCEndpoints: number
  PeeringConnections: number
  LoadBalancers: number
}
