/**
 * release-antecedent CLI - Verify and claim ownership of release resources
 *
 * Commands:
 * - verify: Report whether a release's resources are unclaimed, owned by
 *   the given identifier, or claimed by another one
 * - claim: Annotate every resource of a release with the given identifier
 */

import { Command, Option } from 'commander';
import type {
  CommandContext,
  CommandResult,
  GlobalOptions,
  ReleaseCommandOptions,
} from './types.js';
import { claimCommand, verifyCommand } from './commands/index.js';
import { createLogger } from './api/logger.js';
import { KubernetesConnector } from './api/kubernetes.js';
import { resolveConfig } from './config/index.js';
import { isReleaseId } from './ownership/release-id.js';
import { printResult, error, verbose as verboseLog } from './utils/output.js';

const VERSION = '0.1.0';

/**
 * Create the command context from parsed options
 */
function createContext(options: GlobalOptions): CommandContext {
  const config = resolveConfig({
    cli: {
      kubeconfig: options.kubeconfig,
      context: options.context,
      namespace: options.namespace,
    },
  });

  verboseLog(
    `Namespace: ${config.namespace} (via ${config.sources.namespace}), ` +
      `kubeconfig via ${config.sources.kubeconfig}, context via ${config.sources.context}`,
    options.verbose
  );

  const logger = createLogger({
    level: options.verbose ? 'debug' : 'warn',
    json: options.json,
    // Log lines go to stderr so JSON results on stdout stay parseable
    sink: (_level, line) => console.error(line),
  });

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    config,
    connector: new KubernetesConnector(config.connection, logger),
    logger,
  };
}

/**
 * Run a release command and exit with its code
 */
async function runReleaseCommand<T>(
  name: string,
  run: (ctx: CommandContext, options: ReleaseCommandOptions) => Promise<CommandResult<T>>,
  options: ReleaseCommandOptions
): Promise<void> {
  try {
    const globalOpts = program.opts<GlobalOptions>();
    if (!isReleaseId(options.id)) {
      verboseLog(`${options.id} is not a <namespace>:<kind>/<name> identifier`, globalOpts.verbose);
    }
    const ctx = createContext(globalOpts);
    const result = await run(ctx, options);

    printResult(result, ctx.outputFormat);
    process.exit(result.exitCode ?? (result.success ? 0 : 1));
  } catch (err) {
    error(`${name} failed: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('release-antecedent')
  .description('Verify and claim ownership of release resources through the antecedent annotation')
  .version(VERSION)
  .addOption(new Option('--kubeconfig <path>', 'Path to the kubeconfig file'))
  .addOption(
    new Option('--context <name>', 'Kubeconfig context')
      .env('RELEASE_ANTECEDENT_CONTEXT')
  )
  .addOption(
    new Option('-n, --namespace <name>', 'Namespace for resources that name none')
      .env('RELEASE_ANTECEDENT_NAMESPACE')
  )
  .addOption(
    new Option('--json', 'Output JSON for CI/automation')
      .default(false)
  )
  .addOption(
    new Option('-v, --verbose', 'Enable verbose logging')
      .default(false)
  );

/**
 * verify command - Check ownership before adopting
 */
program
  .command('verify')
  .description('Check whether release resources may be adopted by an identifier')
  .requiredOption('-f, --manifest <file>', 'Rendered release manifest (- for stdin)')
  .requiredOption('--id <releaseId>', 'Expected release identifier')
  .option('--release <name>', 'Release name for log context')
  .action(async (cmdOpts: ReleaseCommandOptions) => {
    await runReleaseCommand('Verify', verifyCommand, cmdOpts);
  });

/**
 * claim command - Annotate release resources
 */
program
  .command('claim')
  .description('Annotate every release resource with an identifier')
  .requiredOption('-f, --manifest <file>', 'Rendered release manifest (- for stdin)')
  .requiredOption('--id <releaseId>', 'Release identifier to record')
  .option('--release <name>', 'Release name for log context')
  .action(async (cmdOpts: ReleaseCommandOptions) => {
    await runReleaseCommand('Claim', claimCommand, cmdOpts);
  });

// Parse and execute
program.parseAsync().catch((err: unknown) => {
  error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
