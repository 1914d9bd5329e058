import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { DescribeRegionsCommand, DescribeSubnetsCommand, DescribeVpcsCommand } from '@aws-sdk/client-ec2'
import { AssumeRoleCommand, STSClient } from '@aws-sdk/client-sts'
import { generateDocumentation, getAccountDocumentation, summarizeDocumentation } from './documentation'
import { DocumentationOptions } from '../types'

const mocks = vi.hoisted(() => ({
  ec2Send: vi.fn(),
  ec2Destroy: vi.fn(),
  elbv2Send: vi.fn(),
  stsSend: vi.fn(),
  stsDestroy: vi.fn(),
  s3Send: vi.fn(),
  s3Destroy: vi.fn(),
  org: {
    listRoots: vi.fn(),
    listOrganizationalUnitsForParent: vi.fn(),
    listAccountsForParent: vi.fn(),
    destroy: vi.fn(),
  },
}))

vi.mock('@aws-sdk/client-ec2', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@aws-sdk/client-ec2')>()),
  // The fake passes its region along so tests can answer per region
  EC2Client: vi.fn(function (config: { region: string }) {
    return { send: (command: unknown) => mocks.ec2Send(command, config.region), destroy: mocks.ec2Destroy }
  }),
}))

vi.mock('@aws-sdk/client-elastic-load-balancing-v2', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@aws-sdk/client-elastic-load-balancing-v2')>()),
  ElasticLoadBalancingV2Client: vi.fn(function () {
    return { send: mocks.elbv2Send, destroy: vi.fn() }
  }),
}))

vi.mock('@aws-sdk/client-sts', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@aws-sdk/client-sts')>()),
  STSClient: vi.fn(function () {
    return { send: mocks.stsSend, destroy: mocks.stsDestroy }
  }),
}))

vi.mock('@aws-sdk/client-s3', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@aws-sdk/client-s3')>()),
  S3Client: vi.fn(function () {
    return { send: mocks.s3Send, destroy: mocks.s3Destroy }
  }),
}))

vi.mock('@aws-sdk/client-organizations', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@aws-sdk/client-organizations')>()),
  Organizations: vi.fn(function () {
    return mocks.org
  }),
}))

const options: DocumentationOptions = {
  roleName: 'NetworkReader',
  bucket: 'docs-bucket',
  key: 'network-documentation.json',
}

const EMPTY_REGION =
  '{"vpcs":[],"subnets":[],"security_groups":[],"network_acls":[],"route_tables":[],' +
  '"vpc_endpoints":[],"vpc_peering_connections":[],"load_balancers":[]}'

// Organization with one OU holding the given accounts
function useOrganization(accountIds: string[]): void {
  mocks.org.listRoots.mockResolvedValue({ Roots: [{ Id: 'r-root' }] })
  mocks.org.listOrganizationalUnitsForParent.mockImplementation(async ({ ParentId }: { ParentId: string }) => ({
    OrganizationalUnits: ParentId === 'r-root' && accountIds.length > 0 ? [{ Id: 'ou-workloads' }] : [],
  }))
  mocks.org.listAccountsForParent.mockImplementation(async ({ ParentId }: { ParentId: string }) => ({
    Accounts: ParentId === 'ou-workloads' ? accountIds.map((id) => ({ Id: id, Status: 'ACTIVE' })) : [],
  }))
}

function useRegions(regions: string[]): void {
  mocks.ec2Send.mockImplementation(async (command: unknown) => {
    if (command instanceof DescribeRegionsCommand) {
      return { Regions: regions.map((RegionName) => ({ RegionName })) }
    }
    return {}
  })
}

function storedBody(): unknown {
  return mocks.s3Send.mock.calls[0][0].input.Body
}

describe('documentation service', () => {
  beforeEach(() => {
    vi.clearAllMocks()
    for (const fn of [mocks.ec2Send, mocks.ec2Destroy, mocks.elbv2Send, mocks.stsSend, mocks.s3Send]) {
      fn.mockReset()
    }
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})

    useOrganization(['111', '222'])
    useRegions(['us-east-1'])
    mocks.elbv2Send.mockResolvedValue({})
    mocks.s3Send.mockResolvedValue({})
    // Account 111 has no assumable role
    mocks.stsSend.mockImplementation(async (command: AssumeRoleCommand) => {
      if (command.input.RoleArn === 'arn:aws:iam::111:role/NetworkReader') {
        throw new Error('AccessDenied')
      }
      return {
        Credentials: { AccessKeyId: 'test-access-key', SecretAccessKey: 'test-secret', SessionToken: 'test-token' },
      }
    })
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('generateDocumentation', () => {
    it('stores {} for an account without a role and empty lists for an empty region', async () => {
      const { stored } = await generateDocumentation(options)

      expect(storedBody()).toBe(`{"111":{},"222":{"us-east-1":${EMPTY_REGION}}}`)
      expect(mocks.s3Send).toHaveBeenCalledTimes(1)
      expect(mocks.s3Send.mock.calls[0][0].input.Bucket).toBe('docs-bucket')
      expect(mocks.s3Send.mock.calls[0][0].input.Key).toBe('network-documentation.json')
      expect(stored.bucket).toBe('docs-bucket')
    })

    it('stores {} when the root has no organizational units', async () => {
      useOrganization([])

      const { documentation } = await generateDocumentation(options)

      expect(documentation).toEqual({})
      expect(storedBody()).toBe('{}')
      expect(mocks.stsSend).not.toHaveBeenCalled()
    })

    it('isolates a failing collector from the other resource types of the region', async () => {
      mocks.ec2Send.mockImplementation(async (command: unknown, region: string) => {
        if (command instanceof DescribeRegionsCommand) {
          return { Regions: [{ RegionName: 'us-east-1' }, { RegionName: 'eu-west-1' }] }
        }
        if (command instanceof DescribeVpcsCommand) {
          return { Vpcs: [{ VpcId: `vpc-${region}` }] }
        }
        if (command instanceof DescribeSubnetsCommand && region === 'eu-west-1') {
          throw new Error('RequestLimitExceeded')
        }
        if (command instanceof DescribeSubnetsCommand) {
          return { Subnets: [{ SubnetId: 'subnet-1' }] }
        }
        return {}
      })

      const { documentation } = await generateDocumentation(options)

      expect(Object.keys(documentation['222'])).toEqual(['us-east-1', 'eu-west-1'])
      expect(documentation['222']['eu-west-1'].subnets).toEqual([])
      expect(documentation['222']['eu-west-1'].vpcs).toEqual([{ VpcId: 'vpc-eu-west-1' }])
      expect(documentation['222']['us-east-1'].subnets).toEqual([{ SubnetId: 'subnet-1' }])
      expect(console.error).toHaveBeenCalledWith(
        'Error retrieving subnets for region eu-west-1:',
        new Error('RequestLimitExceeded'),
      )
    })

    it('has exactly one key per account in the organization', async () => {
      useOrganization(['111', '222', '333'])

      const { documentation } = await generateDocumentation(options)

      expect(Object.keys(documentation)).toEqual(['111', '222', '333'])
    })

    it('keeps every account with an empty mapping when region discovery fails', async () => {
      mocks.ec2Send.mockRejectedValue(new Error('UnauthorizedOperation'))

      const { documentation } = await generateDocumentation(options)

      expect(documentation).toEqual({ '111': {}, '222': {} })
      expect(storedBody()).toBe('{"111":{},"222":{}}')
    })

    it('uses the given regions instead of discovering them', async () => {
      const { documentation } = await generateDocumentation({ ...options, regions: ['ca-central-1', 'eu-north-1'] })

      expect(Object.keys(documentation['222'])).toEqual(['ca-central-1', 'eu-north-1'])
      const discoveryCalls = mocks.ec2Send.mock.calls.filter(([command]) => command instanceof DescribeRegionsCommand)
      expect(discoveryCalls).toHaveLength(0)
    })

    it('documents only the requested account without walking the organization', async () => {
      const { documentation } = await generateDocumentation({ ...options, accountId: '333' })

      expect(Object.keys(documentation)).toEqual(['333'])
      expect(mocks.org.listRoots).not.toHaveBeenCalled()
    })

    it('produces identical output for an unchanged cloud state', async () => {
      await generateDocumentation(options)
      await generateDocumentation(options)

      expect(mocks.s3Send.mock.calls[1][0].input.Body).toBe(mocks.s3Send.mock.calls[0][0].input.Body)
    })

    it('rejects when the upload fails and still releases every client', async () => {
      mocks.s3Send.mockRejectedValue(new Error('NoSuchBucket'))

      await expect(generateDocumentation(options)).rejects.toThrow('NoSuchBucket')

      expect(mocks.org.destroy).toHaveBeenCalledTimes(1)
      expect(mocks.stsDestroy).toHaveBeenCalledTimes(1)
      expect(mocks.s3Destroy).toHaveBeenCalledTimes(1)
      // discovery client plus the region session of account 222
      expect(mocks.ec2Destroy).toHaveBeenCalledTimes(2)
    })
  })

  describe('getAccountDocumentation', () => {
    it('returns an empty mapping when the role cannot be assumed', async () => {
      const documentation = await getAccountDocumentation(new STSClient({}), '111', ['us-east-1'], 'NetworkReader')

      expect(documentation).toEqual({})
      expect(mocks.ec2Send).not.toHaveBeenCalled()
    })

    it('keeps the regions finished before an unexpected fault', async () => {
      const failure = new Error('socket hang up')
      mocks.ec2Destroy.mockImplementationOnce(() => undefined).mockImplementationOnce(() => {
        throw failure
      })

      const documentation = await getAccountDocumentation(
        new STSClient({}),
        '222',
        ['us-east-1', 'eu-west-1', 'ap-south-1'],
        'NetworkReader',
      )

      expect(Object.keys(documentation)).toEqual(['us-east-1'])
      expect(console.error).toHaveBeenCalledWith('Error extracting resources for account 222:', failure)
    })
  })

  describe('summarizeDocumentation', () => {
    it('counts resources per account and region', async () => {
      mocks.ec2Send.mockImplementation(async (command: unknown) => {
        if (command instanceof DescribeVpcsCommand) {
          return { Vpcs: [{ VpcId: 'vpc-1' }, { VpcId: 'vpc-2' }] }
        }
        return {}
      })
      mocks.elbv2Send.mockResolvedValue({ LoadBalancers: [{ LoadBalancerName: 'alb-1' }] })

      const { documentation } = await generateDocumentation({ ...options, regions: ['us-east-1'] })

      expect(summarizeDocumentation(documentation)).toEqual([
        {
          AccountId: '222',
          Region: 'us-east-1',
          VPCs: 2,
          Subnets: 0,
          SecurityGroups: 0,
          NetworkACLs: 0,
          RouteTables: 0,
          VPCEndpoints: 0,
          PeeringConnections: 0,
          LoadBalancers: 1,
        },
      ])
    })
  })
})
