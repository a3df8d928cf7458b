#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { execFile } from 'child_process';
import * as fs from 'fs';
import { promisify } from 'util';
import { AppModule } from './app.module';
import { parseConfig, PROJECT_CONFIG_FILES, ProjectConfig } from './modules/core/config';
import { EmptyDiffError, errorMessage, isReviewError } from './modules/core/errors';
import { logger } from './modules/core/logger';
import { formatForTerminal } from './modules/review/review.formatter';
import { ReviewService } from './modules/review/review.service';

const execFileAsync = promisify(execFile);

export interface CliOptions {
  diffFile?: string;
  targetBranch: string;
  staged: boolean;
  context?: string;
  color: boolean;
  help: boolean;
}

export const USAGE = `Usage: pr-review [options]

Reviews local changes and prints the result. Nothing is posted.

Options:
  --diff-file <path>      review the unified diff in <path>
  --staged                review the staged changes
  --target-branch <name>  compare the current branch with <name> (default: main)
  --context <text>        extra context for the reviewer
  --no-color              disable ANSI colours
  -h, --help              show this help`;

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = {
    targetBranch: 'main',
    staged: false,
    color: true,
    help: false,
  };

  const valueOf = (flag: string, index: number): string => {
    const value = argv[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--diff-file':
        options.diffFile = valueOf(arg, i);
        i++;
        break;
      case '--target-branch':
        options.targetBranch = valueOf(arg, i);
        i++;
        break;
      case '--context':
        options.context = valueOf(arg, i);
        i++;
        break;
      case '--staged':
        options.staged = true;
        break;
      case '--no-color':
        options.color = false;
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }
  return options;
}

async function readDiff(options: CliOptions): Promise<string> {
  if (options.diffFile) {
    return fs.promises.readFile(options.diffFile, 'utf8');
  }
  const args = options.staged
    ? ['diff', '--cached']
    : ['diff', `${options.targetBranch}...HEAD`];
  const { stdout } = await execFileAsync('git', args, { maxBuffer: 64 * 1024 * 1024 });
  return stdout;
}

function readLocalProjectConfig(): ProjectConfig {
  const file = PROJECT_CONFIG_FILES.find((name) => fs.existsSync(name));
  return parseConfig(file ? fs.readFileSync(file, 'utf8') : null);
}

async function main(argv: string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    console.error(`${errorMessage(error)}\n\n${USAGE}`);
    return 2;
  }
  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const diff = await readDiff(options);
  const projectConfig = readLocalProjectConfig();

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn'],
  });
  try {
    logger.info('🔍 Sending changes for review...', 'ReviewCli');
    const review = await app.get(ReviewService).generateReview(diff, {
      mode: projectConfig.review.mode,
      language: projectConfig.review.language,
      maxDiffChars: projectConfig.review.max_diff_chars,
      exclude: projectConfig.files.exclude,
      projectContext: projectConfig.context,
      extraContext: options.context,
    });
    if (review.truncationNote) {
      logger.warn(review.truncationNote, 'ReviewCli');
    }
    console.log(formatForTerminal(review.text, options.color));
    return 0;
  } catch (error) {
    if (error instanceof EmptyDiffError) {
      console.log('No changes found to review.');
      return 0;
    }
    if (isReviewError(error)) {
      logger.error(`${error.kind}: ${error.message}`, 'ReviewCli');
      return 1;
    }
    throw error;
  } finally {
    await app.close();
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error(`Review failed: ${errorMessage(error)}`, 'ReviewCli');
      process.exitCode = 1;
    });
}
