import { S3Client, GetObjectCommand } from '@aws-sdk/client-s3';
import { config } from './config.js';

// Create S3 client
export const s3Client = new S3Client({ region: config.region });

// Read a whole object as UTF-8 text; null when the key does not exist
export async function getObjectText(
  bucket: string,
  key: string,
  signal?: AbortSignal
): Promise<string | null> {
  try {
    const command = new GetObjectCommand({
      Bucket: bucket,
      Key: key,
    });
    const response = await s3Client.send(command, { abortSignal: signal });
    return (await response.Body?.transformToString('utf-8')) ?? null;
  } catch (error: unknown) {
    if (error && typeof error === 'object' && 'name' in error && error.name === 'NoSuchKey') {
      return null;
    }
    throw error;
  }
}
