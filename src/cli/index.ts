#!/usr/bin/env node
/**
 * view-index CLI - print the view index of a directory on disk
 *
 * Usage: view-index [dir] [--scan-paths <csv>] [--json]
 */

import 'dotenv/config';
import * as path from 'path';
import { SCAN_PATHS_PARAM } from '../base/config/types.js';
import {
  combineParameterSources,
  createEnvParameterSource,
  createRecordParameterSource,
} from '../base/config/loader.js';
import { errorMessage, ViewsConfigError } from '../base/utils/errors.js';
import { createFsResourceTree } from '../resources/fs-tree.js';
import { createViewsContext } from '../views/context.js';
import { initializeViews } from '../views/bootstrap.js';
import type { ViewsInitResult } from '../views/types.js';
import { colors, createSpinner, printError, printInfo, printTable, printWarning } from './ui.js';

// ============================================================================
// Arguments
// ============================================================================

export interface CliOptions {
  dir: string;
  scanPaths?: string;
  json: boolean;
  help: boolean;
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { dir: process.cwd(), json: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--json':
        options.json = true;
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '--scan-paths':
        options.scanPaths = argv[++i];
        break;
      default:
        if (arg.startsWith('--scan-paths=')) {
          options.scanPaths = arg.slice('--scan-paths='.length);
        } else if (arg.startsWith('-')) {
          throw new Error(`Unknown option: ${arg}`);
        } else {
          options.dir = path.resolve(arg);
        }
    }
  }

  return options;
}

const USAGE = `Usage: view-index [dir] [--scan-paths <csv>] [--json]

Scans ${colors.highlight('/WEB-INF/faces-views/')} and every extra root under [dir]
and prints the lookup key of each view with its resource path.

Options:
  --scan-paths <csv>  extra roots, e.g. "/,/templates/*.xhtml"
  --json              print the index as JSON
  -h, --help          show this help

Environment: VIEW_INDEX_SCAN_PATHS, VIEW_INDEX_SCAN_ENABLED, VIEW_INDEX_DEBUG`;

// ============================================================================
// Output
// ============================================================================

function printResult(result: ViewsInitResult, json: boolean): void {
  const entries = [...result.views.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  if (json) {
    console.log(
      JSON.stringify(
        { views: Object.fromEntries(entries), extensions: [...result.extensions].sort() },
        null,
        2
      )
    );
    return;
  }

  if (!result.scanned) {
    printWarning('Scanning is disabled');
    return;
  }

  if (entries.length === 0) {
    printInfo('No views found');
    return;
  }

  printTable(['Key', 'Resource'], entries);
  console.log();
  printInfo(`Extensions: ${[...result.extensions].sort().join(', ')}`);
}

// ============================================================================
// Main
// ============================================================================

export async function run(argv: string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    printError(errorMessage(error));
    console.log(USAGE);
    return 1;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const context = createViewsContext({
    resources: createFsResourceTree(options.dir),
    initParameters: combineParameterSources(
      createRecordParameterSource({ [SCAN_PATHS_PARAM]: options.scanPaths }),
      createEnvParameterSource()
    ),
  });

  const spinner = options.json ? null : createSpinner(`Scanning ${options.dir}`).start();

  try {
    const result = await initializeViews(context);
    if (result.scanned) {
      spinner?.succeed(`Scanned ${options.dir}`);
    } else {
      spinner?.stop();
    }
    printResult(result, options.json);
    return 0;
  } catch (error) {
    spinner?.fail('Scan failed');
    if (error instanceof ViewsConfigError) {
      printError(`${error.message} (${error.parameter ?? 'configuration'})`);
      return 1;
    }
    throw error;
  }
}

if (require.main === module) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      printError(errorMessage(error));
      process.exitCode = 1;
    });
}
