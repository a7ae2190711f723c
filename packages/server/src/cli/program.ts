import { Command } from 'commander';
import { z } from 'zod';
import { generateSigningKey } from '@omp/http-signatures';
import { PACKAGE_VERSION } from '../version.js';
import {
  CliError,
  decodeSeed,
  formatBody,
  formatKeyExports,
  parseContent,
  sendSignedPost,
} from './sign-client.js';

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  fetch: typeof fetch;
  env: Record<string, string | undefined>;
  setExitCode: (code: number) => void;
}

const GenKeyOptions = z.object({ keyid: z.string().min(1) });

const PostOptions = z.object({
  host: z.string().min(1),
  path: z.string().startsWith('/'),
  seedB64u: z.string().optional(),
  keyid: z.string().min(1),
  namespace: z.string().min(1),
  json: z.string(),
});

function readOptions<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new CliError(`Invalid --${optionName(issue.path)}: ${issue.message}`);
  }
  return result.data;
}

function optionName(path: (string | number)[]): string {
  return String(path[0] ?? 'option').replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);
}

/** Report a CliError on stderr with its exit code; anything else propagates. */
function withCliErrors(
  io: CliIO,
  action: (raw: unknown) => Promise<void>
): (raw: unknown) => Promise<void> {
  return async (raw) => {
    try {
      await action(raw);
    } catch (error) {
      if (error instanceof CliError) {
        io.stderr(error.message);
        io.setExitCode(error.exitCode);
        return;
      }
      throw error;
    }
  };
}

export function createProgram(io: CliIO): Command {
  const program = new Command();

  program
    .name('omp-sign')
    .description('Generate signing keys and send signed requests to an OMP server')
    .version(PACKAGE_VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (s) => io.stdout(s.replace(/\n$/, '')),
      writeErr: (s) => io.stderr(s.replace(/\n$/, '')),
    });

  program
    .command('gen-key')
    .description('Generate an Ed25519 key pair and print env exports for server and client')
    .option('--keyid <keyid>', 'Key ID the server registers the public key under', 'sig1')
    .action(
      withCliErrors(io, async (raw) => {
        const { keyid } = readOptions(GenKeyOptions, raw);
        const { privateKey, publicKey } = await generateSigningKey();
        for (const line of formatKeyExports(keyid, publicKey, privateKey)) {
          io.stdout(line);
        }
      })
    );

  program
    .command('post')
    .description('Sign and send POST {host}{path} with {namespace, content}')
    .option('--host <url>', 'Server origin', 'http://127.0.0.1:8080')
    .option('--path <path>', 'Request path', '/objects')
    .option('--seed-b64u <seed>', 'Client seed, base64url (default: $SEED_B64U)')
    .option('--keyid <keyid>', 'Key ID', 'sig1')
    .option('--namespace <namespace>', 'Object namespace', 'ns')
    .option('--json <json>', 'Object content', '{"x":1}')
    .action(
      withCliErrors(io, async (raw) => {
        const options = readOptions(PostOptions, raw);
        const result = await sendSignedPost(
          {
            host: options.host,
            path: options.path,
            seed: decodeSeed(options.seedB64u ?? io.env.SEED_B64U),
            keyid: options.keyid,
            namespace: options.namespace,
            content: parseContent(options.json),
          },
          io.fetch
        );
        io.stdout(`Status: ${result.status}`);
        io.stdout(formatBody(result.body));
        io.setExitCode(result.ok ? 0 : 1);
      })
    );

  return program;
}
