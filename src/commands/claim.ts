/**
 * claim command - Annotate a release's resources with its identifier
 */

import type { CommandContext, CommandResult, ReleaseCommandOptions } from '../types.js';
import { claimOwnership } from '../ownership/claim.js';
import { formatResource, header, info, printOutcomes, verbose } from '../utils/output.js';
import { readManifestInput } from './input.js';

export interface ClaimCommandData {
  claimed: number;
  failed: number;
  resources: Array<{
    resource: string;
    success: boolean;
    error?: string;
  }>;
}

/**
 * Execute the claim command
 *
 * Succeeds whenever the claim ran, even if some resources could not be
 * annotated; those are listed in `errors` for a later pass.
 */
export async function claimCommand(
  ctx: CommandContext,
  options: ReleaseCommandOptions
): Promise<CommandResult<ClaimCommandData>> {
  const { options: globalOpts, outputFormat, config } = ctx;

  verbose(`Claiming resources for ${options.id} in namespace ${config.namespace}`, globalOpts.verbose);

  const manifest = await readManifestInput(options.manifest);
  const result = await claimOwnership(
    { manifest, namespace: config.namespace, name: options.release },
    options.id,
    ctx.connector,
    { logger: ctx.logger }
  );

  if (!result.success) {
    return {
      success: false,
      message: 'Claim could not start',
      errors: [result.error.message],
      exitCode: 1,
    };
  }

  if (outputFormat === 'human') {
    header('Claim Results');
    printOutcomes(result.outcomes);
    if (result.failed > 0) {
      info('Resources that failed will be retried by the next claim');
    }
  }

  const data: ClaimCommandData = {
    claimed: result.claimed,
    failed: result.failed,
    resources: result.outcomes.map((outcome) =>
      outcome.success
        ? { resource: formatResource(outcome.descriptor), success: true }
        : {
            resource: formatResource(outcome.descriptor),
            success: false,
            error: outcome.error.message,
          }
    ),
  };

  const errors = result.outcomes.flatMap((outcome) =>
    outcome.success ? [] : [`${formatResource(outcome.descriptor)}: ${outcome.error.message}`]
  );

  return {
    success: true,
    message: `Claimed ${result.claimed}/${result.outcomes.length} resources for ${options.id}`,
    data,
    errors: errors.length > 0 ? errors : undefined,
    exitCode: 0,
  };
}
