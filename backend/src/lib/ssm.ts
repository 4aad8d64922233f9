import { SSMClient, GetParameterCommand } from '@aws-sdk/client-ssm';
import { config } from './config.js';

const ssmClient = new SSMClient({ region: config.region });

/**
 * Read a (possibly encrypted) string parameter. Returns null when the
 * parameter exists but has no value.
 */
export async function getParameterValue(name: string): Promise<string | null> {
  const command = new GetParameterCommand({
    Name: name,
    WithDecryption: true,
  });

  const response = await ssmClient.send(command);
  return response.Parameter?.Value ?? null;
}
