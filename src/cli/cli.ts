#!/usr/bin/env node
/**
 * cloudrun-deployer CLI
 * Preview, apply and destroy a deployment file from the command line
 */

import { Option, program } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { argv, exit } from 'node:process';
import { createContainer, type Deps } from '../app/container';
import type { LogLevel } from '../config/app-config';
import { isDeploymentError, errorMessage, type DeploymentError } from '../errors';
import type { Result } from '../domain/types/result';
import type { DeploymentResult } from '../workflows/deploy/deployment-workflow';
import { applyDeployment } from '../tools/apply-deployment';
import { destroyDeployment } from '../tools/destroy-deployment';
import { listOutputs } from '../tools/list-outputs';
import { previewDeployment } from '../tools/preview-deployment';
import type { DeploymentTargetParams, ToolContext } from '../tools/types';
import { formatOutputs, formatResult } from './format';

const packageJsonPath = __dirname.includes('dist')
  ? join(__dirname, '../../../package.json') // dist/src/cli/ -> root
  : join(__dirname, '../../package.json'); // src/cli/ -> root

function readVersion(): string {
  const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed) {
    return String(parsed.version);
  }
  return '0.0.0';
}

type CliOptions = {
  file: string;
  only?: string[];
  logLevel?: LogLevel;
  json?: boolean;
};

type DeploymentTool = (
  params: DeploymentTargetParams,
  context: ToolContext,
) => Promise<Result<DeploymentResult, DeploymentError>>;

const EXIT_FAILED = 1;
const EXIT_CANCELLED = 130;

function print(lines: string[]): void {
  process.stdout.write(`${lines.join('\n')}\n`);
}

function printError(error: unknown): void {
  if (isDeploymentError(error)) {
    console.error(`❌ ${error.code}: ${error.message}`);
    const violations = error.context.violations;
    if (Array.isArray(violations)) {
      violations.forEach((violation) => console.error(`  • ${String(violation)}`));
    }
    return;
  }
  console.error(`❌ ${errorMessage(error)}`);
}

function createDeps(options: CliOptions): Deps {
  return createContainer({ logLevel: options.logLevel, logToStderr: true });
}

/**
 * Abort the pass on the first Ctrl-C; a second one exits immediately
 */
function cancellationSignal(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    if (controller.signal.aborted) {
      exit(EXIT_CANCELLED);
    }
    console.error('⚠️  Cancelling; in-flight calls finish first, nothing is rolled back');
    controller.abort();
  };
  process.on('SIGINT', onInterrupt);
  return { signal: controller.signal, dispose: () => process.off('SIGINT', onInterrupt) };
}

async function runTool(tool: DeploymentTool): Promise<void> {
  const options = program.opts<CliOptions>();
  const deps = createDeps(options);
  const { signal, dispose } = cancellationSignal();

  try {
    const result = await tool({ file: options.file, only: options.only }, { deps, signal });
    if (!result.ok) {
      printError(result.error);
      process.exitCode = EXIT_FAILED;
      return;
    }

    const outcome = result.value;
    if (options.json) {
      print([JSON.stringify(outcome, null, 2)]);
    } else {
      print(formatResult(outcome));
    }

    if (!outcome.succeeded) {
      const cancelled = outcome.chains.some((chain) => chain.status === 'cancelled');
      process.exitCode = cancelled ? EXIT_CANCELLED : EXIT_FAILED;
    }
  } finally {
    dispose();
  }
}

async function runOutputs(): Promise<void> {
  const options = program.opts<CliOptions>();
  const deps = createDeps(options);

  const result = await listOutputs({ only: options.only }, { deps });
  if (!result.ok) {
    printError(result.error);
    process.exitCode = EXIT_FAILED;
    return;
  }
  print(options.json ? [JSON.stringify(result.value, null, 2)] : formatOutputs(result.value));
}

program
  .name('cloudrun-deployer')
  .description('Declarative deployments of container images to Cloud Run')
  .version(readVersion())
  .option('-f, --file <path>', 'deployment file (YAML or JSON)', 'deployment.yaml')
  .option('--only <ids...>', 'restrict the pass to these resource ids')
  .addOption(
    new Option('--log-level <level>', 'logging level').choices([
      'fatal',
      'error',
      'warn',
      'info',
      'debug',
      'trace',
      'silent',
    ]),
  )
  .option('--json', 'print results as JSON on stdout')
  .addHelpText(
    'after',
    `

Examples:
  $ cloudrun-deployer preview                   Show what would change
  $ cloudrun-deployer up -f deploy/prod.yaml    Build, push and roll out
  $ cloudrun-deployer up --only api             Deploy a single unit
  $ cloudrun-deployer outputs --json            Image refs and URLs of deployed units
  $ cloudrun-deployer destroy                   Delete every service in the file

Environment Variables:
  LOG_LEVEL                       Logging level (default: info)
  GOOGLE_CLOUD_PROJECT            Project when the file names none
  GOOGLE_CLOUD_REGION             Region when the file names none
  GOOGLE_OAUTH_ACCESS_TOKEN       Access token instead of gcloud
  DEPLOYER_STATE_DIR              State directory (default: .deployer/state)
  DOCKER_SOCKET                   Docker daemon socket path
  DEPLOYER_RECONCILE_TIMEOUT_MS   How long a service may take to become ready
  DEPLOYER_POLL_INTERVAL_MS       Delay between readiness checks
  DEPLOYER_PUSH_ATTEMPTS          Push attempts before giving up
`,
  );

program
  .command('preview')
  .description('plan the deployment without changing anything')
  .action(() => runTool(previewDeployment));

program
  .command('up')
  .description('build, push and reconcile every service')
  .action(() => runTool(applyDeployment));

program
  .command('destroy')
  .description('delete the services and forget their state')
  .action(() => runTool(destroyDeployment));

program
  .command('outputs')
  .description('show image references and URLs of deployed services')
  .action(() => runOutputs());

program.parseAsync(argv).catch((error: unknown) => {
  printError(error);
  exit(EXIT_FAILED);
});
