#!/usr/bin/env node

import { Command } from 'commander';
import { logError } from '../logger.js';
import { DEFAULT_GENERATOR_OPTIONS, type GenerateClientOptions } from './config.js';
import { generateClient } from './generator.js';

interface CLIOptions {
  clientName?: string;
  apiKeyEnv?: string;
  baseUrl?: string;
  runtimeImport?: string;
  strictContentTypes?: boolean;
}

export function toGenerateOptions(
  spec: string,
  output: string | undefined,
  options: CLIOptions
): GenerateClientOptions {
  return {
    openApiSpec: spec,
    outputFile: output,
    clientName: options.clientName,
    apiKeyEnvVar: options.apiKeyEnv,
    fallbackBaseUrl: options.baseUrl,
    runtimeImport: options.runtimeImport,
    strictContentTypes: options.strictContentTypes,
  };
}

/**
 * Build the `openapi-callgen` command. Missing arguments print the usage and
 * exit with status 1; generation failures are logged and set exit code 1.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('openapi-callgen')
    .description('Generate a TypeScript API client from an OpenAPI document')
    .argument('<spec>', 'Path to the OpenAPI document (YAML or JSON)')
    .argument('[output]', 'File to write the client to', DEFAULT_GENERATOR_OPTIONS.outputFile)
    .option('--client-name <name>', 'Name of the generated client class', DEFAULT_GENERATOR_OPTIONS.clientName)
    .option('--api-key-env <var>', 'Environment variable holding the API key', DEFAULT_GENERATOR_OPTIONS.apiKeyEnvVar)
    .option('--base-url <url>', 'Base URL when the document declares no server')
    .option('--runtime-import <module>', 'Module the client imports HttpClient from')
    .option('--strict-content-types', 'Fail on request bodies that are neither JSON nor multipart')
    .showHelpAfterError()
    .action(async (spec: string, output: string | undefined, options: CLIOptions) => {
      try {
        await generateClient(toGenerateOptions(spec, output, options));
      } catch (error) {
        logError(error, 'Generation failed');
        process.exitCode = 1;
      }
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      logError(error);
      process.exitCode = 1;
    });
}
