#!/usr/bin/env node
/**
 * tagship CLI
 *
 * One-shot release runs from a terminal or CI job. Exit status: 0 when every
 * selected target published (or the ref was not a release tag), 1 when any
 * target failed, 2 for configuration and usage errors.
 *
 * Usage:
 *   tagship release <ref> [--target <name...>] [--config <path>] [--source <dir>] [--json]
 *   tagship targets [--config <path>]
 */

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import dotenv from 'dotenv';
import { RunCancelledError } from './concurrency/deadline.js';
import { loadEnv } from './config/env.js';
import { configuredTargets, loadReleaseConfig } from './config/release-config.js';
import { ConfigError, UnknownTargetError } from './errors/errors.js';
import { logger } from './observability/logger.js';
import { EXIT_CONFIG_ERROR, EXIT_OK, exitCodeFor, formatOutcome } from './output/formatter.js';
import { createReleaseOrchestrator, type PipelineOptions } from './pipeline/factory.js';
import type { ReleaseOrchestrator } from './pipeline/orchestrator.js';

const VERSION = '0.1.0';

export interface CliDependencies {
  createOrchestrator?: (options: PipelineOptions) => Promise<ReleaseOrchestrator>;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  write?: (text: string) => void;
  writeError?: (text: string) => void;
}

interface ReleaseCommandOptions {
  target?: string[];
  config?: string;
  source?: string;
  json?: boolean;
}

interface TargetsCommandOptions {
  config?: string;
}

function reportConfigError(error: unknown, writeError: (text: string) => void): number | null {
  if (error instanceof ConfigError || error instanceof UnknownTargetError) {
    writeError(`${chalk.red('Error:')} ${error.message}`);
    return EXIT_CONFIG_ERROR;
  }
  return null;
}

export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const write = deps.write ?? ((text: string) => process.stdout.write(`${text}\n`));
  const writeError = deps.writeError ?? ((text: string) => process.stderr.write(`${text}\n`));
  const createOrchestrator = deps.createOrchestrator ?? createReleaseOrchestrator;
  let exitCode = EXIT_OK;

  const program = new Command();

  program
    .name('tagship')
    .description('Release a tagged version to the package index and the release page')
    .version(VERSION, '-V, --version', 'Output the version number')
    .exitOverride()
    .configureOutput({
      writeOut: text => write(text.trimEnd()),
      writeErr: text => writeError(text.trimEnd()),
    });

  program
    .command('release <ref>')
    .description('Build, verify and publish every target for a v<major>.<minor>.<patch> tag')
    .option('-t, --target <names...>', 'Only these targets (re-run after a partial release)')
    .option('-c, --config <path>', 'Release config file (default: RELEASE_CONFIG_PATH or release.config.json)')
    .option('--source <dir>', 'Source tree root (default: SOURCE_ROOT or the working directory)')
    .option('--json', 'Print the outcome as JSON')
    .action(async (ref: string, options: ReleaseCommandOptions) => {
      try {
        const env = loadEnv(deps.env ?? process.env);
        const config = loadReleaseConfig(options.config ?? env.RELEASE_CONFIG_PATH);
        const orchestrator = await createOrchestrator({ config, env, sourceRoot: options.source });
        const outcome = await orchestrator.run(ref, { targets: options.target, signal: deps.signal });

        write(options.json ? JSON.stringify(outcome, null, 2) : formatOutcome(outcome));
        exitCode = exitCodeFor(outcome);
      } catch (error) {
        const code = reportConfigError(error, writeError);
        if (code === null) throw error;
        exitCode = code;
      }
    });

  program
    .command('targets')
    .description('List the configured build targets')
    .option('-c, --config <path>', 'Release config file')
    .action((options: TargetsCommandOptions) => {
      try {
        const env = loadEnv(deps.env ?? process.env);
        const config = loadReleaseConfig(options.config ?? env.RELEASE_CONFIG_PATH);
        for (const target of configuredTargets(config)) {
          write(target.platform ? `${target.name}\t${target.kind}\t${target.platform}` : `${target.name}\t${target.kind}`);
        }
      } catch (error) {
        const code = reportConfigError(error, writeError);
        if (code === null) throw error;
        exitCode = code;
      }
    });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_OK : EXIT_CONFIG_ERROR;
    }
    throw error;
  }

  return exitCode;
}

if (require.main === module) {
  dotenv.config();
  // Logs go to stderr so stdout carries only the report.
  logger.setSink(line => process.stderr.write(`${line}\n`));

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort(new RunCancelledError('Interrupted')));

  runCli(process.argv.slice(2), { signal: controller.signal })
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error(chalk.red('Error:'), error instanceof Error ? error.message : 'Unknown error');
      process.exitCode = 1;
    });
}
