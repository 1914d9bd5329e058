// File: src/services/s3.ts
// Documentation store: writes the collected documentation to S3 as one JSON object

import { S3Client, PutObjectCommand } from '@aws-sdk/client-s3'
import { logProgress } from '../utils/logger'
import { Documentation, DocumentationLocation, StoredDocumentation } from '../types'

/**
 * Serialize the documentation and upload it, replacing any object already at the key
 *
 * Errors from S3 are not caught here; the caller decides how the run fails.
 *
 * @param s3Client - S3 client using the caller's own credentials
 * @param documentation - Full account -> region -> resource type mapping
 * @param location - Bucket and key to write to
 */
export async function storeDocumentation(
  s3Client: S3Client,
  documentation: Documentation,
  location: DocumentationLocation,
): Promise<StoredDocumentation> {
  const body = JSON.stringify(documentation)

  await s3Client.send(
    new PutObjectCommand({
      Bucket: location.bucket,
      Key: location.key,
      Body: body,
      ContentType: 'application/json',
    }),
  )

  const bytes = Buffer.byteLength(body, 'utf8')
  logProgress(`Stored network documentation (${bytes} bytes) at s3://${location.bucket}/${location.key}`)

  return { bucket: location.bucket, key: location.key, bytes }
}
