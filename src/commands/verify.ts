/**
 * verify command - Check who owns a release's resources
 */

import type { CommandContext, CommandResult, ReleaseCommandOptions } from '../types.js';
import { verifyOwnership } from '../ownership/verify.js';
import type { OwnershipStatus } from '../ownership/types.js';
import { header, printVerification, verbose } from '../utils/output.js';
import { readManifestInput } from './input.js';

/** Exit code when the release belongs to another identifier */
export const EXIT_FOREIGN = 2;

export interface VerifyCommandData {
  status: OwnershipStatus;
  owned: boolean;
  antecedent: string;
  /** `Kind/name` of the resource that decided the result */
  resource?: string;
}

/**
 * Execute the verify command
 */
export async function verifyCommand(
  ctx: CommandContext,
  options: ReleaseCommandOptions
): Promise<CommandResult<VerifyCommandData>> {
  const { options: globalOpts, outputFormat, config } = ctx;

  verbose(`Verifying ownership for ${options.id} in namespace ${config.namespace}`, globalOpts.verbose);

  const manifest = await readManifestInput(options.manifest);
  const verification = await verifyOwnership(
    { manifest, namespace: config.namespace, name: options.release },
    options.id,
    ctx.connector,
    { logger: ctx.logger, retry: config.retry }
  );

  if (outputFormat === 'human') {
    header('Release Ownership');
    printVerification(verification);
  }

  const data: VerifyCommandData = {
    status: verification.status,
    owned: verification.owned,
    antecedent: verification.antecedent,
  };
  if (verification.status !== 'unclaimed' && verification.resource) {
    data.resource = `${verification.resource.kind}/${verification.resource.name}`;
  }

  switch (verification.status) {
    case 'unclaimed':
      return { success: true, message: 'Release resources are unclaimed', data, exitCode: 0 };
    case 'owned':
      return { success: true, message: `Release is owned by ${verification.antecedent}`, data, exitCode: 0 };
    case 'foreign':
      return {
        success: false,
        message: `Release is claimed by ${verification.antecedent}`,
        data,
        exitCode: EXIT_FOREIGN,
      };
    case 'error':
      return {
        success: false,
        message: 'Cannot determine release ownership',
        data,
        errors: [verification.error.message],
        exitCode: 1,
      };
  }
}
