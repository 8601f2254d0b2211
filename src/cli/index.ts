#!/usr/bin/env node
/**
 * Task DAG Orchestrator - CLI Entry Point
 *
 * Usage:
 *   task-dag run "<description>" [--format summary|detailed|json] [--config <path>] [--sequential] [--verbose]
 *   task-dag plan "<description>" [--config <path>]
 *   task-dag --help | --version
 */

import * as fs from 'fs';
import * as path from 'path';
import { CLI, EXIT_ERROR } from './cli-interface';

/**
 * Version from package.json; the same relative path works from src/ and dist/
 */
function readVersion(): string {
  const packagePath = path.join(__dirname, '..', '..', 'package.json');
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(packagePath, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch (error) {
    console.error(`Could not read ${packagePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return '0.0.0';
}

async function main(): Promise<void> {
  const cli = new CLI({ version: readVersion() });
  const result = await cli.run(process.argv.slice(2));

  if (result.exitCode === EXIT_ERROR) {
    console.error(result.output);
  } else {
    console.log(result.output);
  }
  process.exitCode = result.exitCode;
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : String(error));
  process.exitCode = EXIT_ERROR;
});
