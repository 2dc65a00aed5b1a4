#!/usr/bin/env node
/**
 * Machine Image Builder CLI
 * Validates build definitions outside of a build
 */

import { program } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { exit, argv, stdout, stderr } from 'node:process';
import { createLogger, isLogLevel } from '@/lib/logger';
import { extractErrorMessage } from '@/lib/errors';
import { runValidate, EXIT_CODES } from './validate';

const packageJsonPath = __dirname.includes('dist')
  ? join(__dirname, '../../../package.json') // dist/src/cli/ -> root
  : join(__dirname, '../../package.json'); // src/cli/ -> root
const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
const version =
  typeof packageJson === 'object' &&
  packageJson !== null &&
  'version' in packageJson &&
  typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';

interface ValidateCommandOptions {
  force?: boolean;
  var?: string[];
  json?: boolean;
  logLevel: string;
}

program
  .name('gce-machine-image')
  .description('Validate Compute Engine machine image build definitions')
  .version(version);

program
  .command('validate')
  .description('prepare a JSON build definition and report every configuration error')
  .argument('<file>', 'build definition (JSON object of builder fields)')
  .option('--force', 'set packer_force, allowing an existing machine image to be replaced')
  .option('--var <key=value...>', 'user variables for {{user "key"}} templates')
  .option('--json', 'print the normalized configuration as JSON')
  .option('--log-level <level>', 'logging level: debug, info, warn, error', 'warn')
  .addHelpText(
    'after',
    `

Examples:
  $ gce-machine-image validate build.json
  $ gce-machine-image validate build.json --var version=1.2.3 --json

Exit codes:
  0  configuration is valid
  1  configuration has errors
  2  the file or arguments could not be read

Environment Variables:
  LOG_LEVEL    Logging level when --log-level is not given
`,
  )
  .action(async (file: string, opts: ValidateCommandOptions) => {
    const level = isLogLevel(opts.logLevel) ? opts.logLevel : 'warn';
    const logger = createLogger({ name: 'cli', level });
    const code = await runValidate(
      file,
      {
        ...(opts.force !== undefined && { force: opts.force }),
        ...(opts.var !== undefined && { vars: opts.var }),
        ...(opts.json !== undefined && { json: opts.json }),
      },
      { stdout, stderr, logger },
    );
    exit(code);
  });

program.parseAsync(argv).catch((error: unknown) => {
  stderr.write(`❌ ${extractErrorMessage(error)}\n`);
  exit(EXIT_CODES.BAD_INPUT);
});
