/**
 * contract-delta command line
 *
 *   contract-delta run <original_folder> <amendment_folder> <contract_id>
 *
 * Prints the change summary as JSON on stdout. Diagnostics go to stderr and
 * nothing is printed on stdout unless the whole pipeline succeeded.
 */

import { Command, CommanderError } from 'commander';
import { ulid } from 'ulid';
import {
  logger,
  loadConfig,
  resolvePipelineSettings,
  runWithContextAsync,
  runComparison,
  OpenAIModelClient,
  UsageError,
  type ModelClient,
  type PipelineSettings,
} from '@contract-delta/shared';

export const USAGE = 'Usage: contract-delta run <original_folder> <amendment_folder> <contract_id>';

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface CliDeps {
  env?: Record<string, string | undefined>;
  createClient?: (settings: PipelineSettings) => ModelClient;
}

function defaultClient(settings: PipelineSettings): ModelClient {
  return new OpenAIModelClient({
    apiKey: settings.apiKey,
    baseUrl: settings.baseUrl,
    timeoutMs: settings.timeoutMs,
  });
}

async function runCommand(
  originalFolder: string,
  amendmentFolder: string,
  contractId: string,
  io: CliIO,
  deps: CliDeps
): Promise<number> {
  try {
    const settings = resolvePipelineSettings(loadConfig(deps.env ?? process.env));
    const client = (deps.createClient ?? defaultClient)(settings);

    const result = await runWithContextAsync({ correlationId: ulid(), contractId }, () =>
      runComparison({ contractId, originalFolder, amendmentFolder }, { client, settings })
    );

    io.stdout(`${JSON.stringify(result.summary, null, 2)}\n`);
    return 0;
  } catch (error) {
    logger.error('Comparison failed', error, { contractId });
    io.stderr(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }
}

/**
 * Run the CLI against `args` (without the node and script entries) and
 * resolve with the process exit code.
 */
export async function main(args: string[], io: CliIO, deps: CliDeps = {}): Promise<number> {
  let exitCode = 0;

  const program = new Command('contract-delta')
    .description('Compare a contract with its amendment and summarize the changes')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
      outputError: () => undefined,
    });

  program
    .command('run')
    .description('Run the comparison pipeline over two folders of page images')
    .argument('<original_folder>', 'folder with the original contract pages')
    .argument('<amendment_folder>', 'folder with the amendment pages')
    .argument('<contract_id>', 'identifier used in logs and traces')
    .allowExcessArguments(false)
    .action(async (originalFolder: string, amendmentFolder: string, contractId: string) => {
      exitCode = await runCommand(originalFolder, amendmentFolder, contractId, io, deps);
    });

  try {
    await program.parseAsync(args, { from: 'user' });
  } catch (error) {
    if (!(error instanceof CommanderError)) {
      throw error;
    }
    if (error.exitCode === 0) {
      return 0;
    }
    if (error.code !== 'commander.help') {
      const usage = new UsageError(error.message.replace(/^error: /, ''));
      io.stderr(`${usage.message}\n`);
    }
    io.stderr(`${USAGE}\n`);
    return 1;
  }

  return exitCode;
}
