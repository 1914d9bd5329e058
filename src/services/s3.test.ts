import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3'
import { storeDocumentation } from './s3'

const { s3Send } = vi.hoisted(() => ({ s3Send: vi.fn() }))

vi.mock('@aws-sdk/client-s3', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@aws-sdk/client-s3')>()),
  S3Client: vi.fn(function () {
    return { send: s3Send, destroy: vi.fn() }
  }),
}))

describe('storeDocumentation', () => {
  let client: S3Client

  beforeEach(() => {
    vi.clearAllMocks()
    s3Send.mockReset()
    vi.spyOn(console, 'error').mockImplementation(() => {})
    client = new S3Client({ region: 'us-east-1' })
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('uploads the documentation as compact JSON to the bucket and key', async () => {
    s3Send.mockResolvedValueOnce({})

    const stored = await storeDocumentation(client, { '111': {} }, { bucket: 'docs-bucket', key: 'net/doc.json' })

    const command = s3Send.mock.calls[0][0]
    expect(command).toBeInstanceOf(PutObjectCommand)
    expect(command.input).toEqual({
      Bucket: 'docs-bucket',
      Key: 'net/doc.json',
      Body: '{"111":{}}',
      ContentType: 'application/json',
    })
    expect(stored).toEqual({ bucket: 'docs-bucket', key: 'net/doc.json', bytes: 10 })
    expect(console.error).toHaveBeenCalledWith('Stored network documentation (10 bytes) at s3://docs-bucket/net/doc.json')
  })

  it('stores an empty organization as {}', async () => {
    s3Send.mockResolvedValueOnce({})

    await storeDocumentation(client, {}, { bucket: 'docs-bucket', key: 'doc.json' })

    expect(s3Send.mock.calls[0][0].input.Body).toBe('{}')
  })

  it('propagates upload failures', async () => {
    s3Send.mockRejectedValueOnce(new Error('NoSuchBucket'))

    await expect(storeDocumentation(client, {}, { bucket: 'missing', key: 'doc.json' })).rejects.toThrow('NoSuchBucket')
  })
})
