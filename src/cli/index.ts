#!/usr/bin/env node

/**
 * warden-jwt CLI
 *
 * Commands:
 * - warden gen-secret: Generate a random signing secret
 * - warden sign: Build and sign a token
 * - warden inspect: Decode and display token contents
 * - warden verify: Verify a token's signature and time window
 */

import { Command } from 'commander';
import chalk from 'chalk';

import {
  createToken,
  decodeToken,
  generateSecret,
  Signer,
  systemClock,
  Verifier,
  VERSION,
  WardenError,
  DEFAULT_GENERATED_SECRET_LENGTH,
} from '../index';
import { DecodedToken, Ttl, WardenAlgorithm } from '../types';
import {
  formatRelative,
  formatTimestamp,
  parseAlgorithm,
  parseScopes,
  parseSecretLength,
  parseTtl,
  resolveSecret,
  timeStatus,
} from './helpers';

// ============================================================================
// OUTPUT
// ============================================================================

const print = {
  success: (msg: string) => console.log(chalk.green('✓'), msg),
  error: (msg: string) => console.error(chalk.red('✗'), msg),
  info: (msg: string) => console.log(chalk.blue('ℹ'), msg),
  header: (msg: string) => console.log(chalk.bold.cyan('\n' + msg)),
  json: (obj: unknown) => console.log(JSON.stringify(obj, null, 2)),
};

function fail(error: unknown): void {
  print.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
}

// ============================================================================
// COMMANDS
// ============================================================================

function genSecretCommand(length: number): void {
  console.log(generateSecret(length));
}

interface SignCommandOptions {
  secret?: string;
  alg: WardenAlgorithm;
  sub?: string;
  iss?: string;
  aud?: string;
  scopes?: string[];
  ttl?: Ttl;
  jti: boolean;
}

function signCommand(options: SignCommandOptions): void {
  try {
    const signer = new Signer({ secret: resolveSecret(options.secret), alg: options.alg });
    const token = createToken(
      {
        sub: options.sub,
        iss: options.iss,
        aud: options.aud,
        scopes: options.scopes,
        jti: options.jti ? undefined : false,
      },
      { ttl: options.ttl }
    );
    console.log(signer.sign(token));
  } catch (error) {
    fail(error);
  }
}

function tryDecode(compact: string): DecodedToken | null {
  try {
    return decodeToken(compact);
  } catch (error) {
    fail(error);
    return null;
  }
}

function inspectCommand(compact: string, options: { json?: boolean }): void {
  const decoded = tryDecode(compact);
  if (!decoded) return;

  const { header, claims } = decoded;
  if (options.json) {
    print.json({ header, claims });
    return;
  }

  const now = systemClock.now();

  print.header('Header');
  print.json(header);
  print.header('Claims');
  print.json(claims);

  console.log(chalk.bold('\nTimestamps:'));
  for (const claim of ['iat', 'nbf', 'exp'] as const) {
    const value = claims[claim];
    if (typeof value === 'number') {
      console.log(`  ${chalk.dim(`${claim}:`)} ${formatTimestamp(value)} ${chalk.dim(`(${formatRelative(value, now)})`)}`);
    }
  }
  if (claims.exp === undefined) {
    console.log(`  ${chalk.dim('exp:')} never`);
  }

  const status = timeStatus(claims, now);
  const color = status === 'valid' ? chalk.green : chalk.red;
  console.log(`  ${chalk.dim('Status:')} ${color(status.toUpperCase())} ${chalk.dim('(signature not checked)')}`);
}

async function verifyCommand(compact: string, options: { secret?: string; alg: WardenAlgorithm }): Promise<void> {
  try {
    const verifier = new Verifier({ secret: resolveSecret(options.secret), alg: options.alg });
    const result = await verifier.run(compact);

    if (!result.valid) {
      print.error(`Token rejected: ${result.reason}`);
      process.exitCode = 1;
      return;
    }

    print.success('Token is valid');
    print.json(result.token);
  } catch (error) {
    fail(error);
  }
}

// ============================================================================
// CLI PROGRAM
// ============================================================================

const program = new Command();

program
  .name('warden')
  .description(chalk.cyan('warden-jwt CLI'))
  .version(VERSION, '-v, --version')
  .addHelpText('after', `
${chalk.bold('Examples:')}
  ${chalk.dim('# Generate a 64 character secret')}
  $ warden gen-secret

  ${chalk.dim('# Sign a token valid for 10 minutes')}
  $ WARDEN_SECRET=... warden sign --sub 42 --scopes user/read,user/write --ttl 600

  ${chalk.dim('# Inspect and verify a token')}
  $ warden inspect eyJhbGciOiJIUzI1NiIsInR5cCI6Ikp...
  $ warden verify eyJhbGciOiJIUzI1NiIsInR5cCI6Ikp... --secret ...
`);

program
  .command('gen-secret')
  .description('Generate a random base64url secret')
  .argument('[length]', 'Secret length (at least 32)', parseSecretLength, DEFAULT_GENERATED_SECRET_LENGTH)
  .action(genSecretCommand);

program
  .command('sign')
  .description('Build and sign a token')
  .option('-s, --secret <secret>', 'Signing secret (default: $WARDEN_SECRET)')
  .option('-a, --alg <alg>', 'Algorithm (HS256, HS384, HS512)', parseAlgorithm, WardenAlgorithm.HS256)
  .option('--sub <sub>', 'Subject')
  .option('--iss <iss>', 'Issuer')
  .option('--aud <aud>', 'Audience')
  .option('--scopes <scopes>', 'Comma separated scopes', parseScopes)
  .option('--ttl <ttl>', 'Lifetime in seconds, or "infinity"', parseTtl)
  .option('--no-jti', 'Omit the token id')
  .action(signCommand);

program
  .command('inspect <token>')
  .description('Decode and display the contents of a token without verifying it')
  .option('-j, --json', 'Output as JSON')
  .action(inspectCommand);

program
  .command('verify <token>')
  .description('Verify the signature and time window of a token')
  .option('-s, --secret <secret>', 'Signing secret (default: $WARDEN_SECRET)')
  .option('-a, --alg <alg>', 'Algorithm (HS256, HS384, HS512)', parseAlgorithm, WardenAlgorithm.HS256)
  .action(verifyCommand);

program.parseAsync().catch((error: unknown) => {
  fail(error instanceof WardenError ? `${error.code}: ${error.message}` : error);
});
