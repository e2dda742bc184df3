/**
 * Token input for CLI commands: --token, --token-file, or stdin
 */

import { readFile } from 'node:fs/promises';

export interface TokenSourceOptions {
  token?: string;
  tokenFile?: string;
}

async function readStream(stream: AsyncIterable<string | Buffer>): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export async function readToken(
  options: TokenSourceOptions,
  stdin: AsyncIterable<string | Buffer> = process.stdin
): Promise<string> {
  let token: string;
  if (options.token !== undefined) {
    token = options.token;
  } else if (options.tokenFile !== undefined) {
    token = await readFile(options.tokenFile, 'utf-8');
  } else {
    token = await readStream(stdin);
  }

  token = token.trim();
  if (token.length === 0) {
    throw new Error('No token provided (use --token, --token-file or stdin)');
  }
  return token;
}
