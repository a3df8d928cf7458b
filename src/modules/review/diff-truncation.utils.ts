import { minimatch } from 'minimatch';
import parseDiff, { File as ParsedFile } from 'parse-diff';
import { TruncationSummary } from './review.types';

/** Files whose changes are never worth the model's attention. */
export const DEFAULT_EXCLUDES = [
  '**/package-lock.json',
  '**/npm-shrinkwrap.json',
  '**/yarn.lock',
  '**/pnpm-lock.yaml',
  '**/*.min.js',
  '**/*.min.css',
  '**/*.map',
  '**/*.snap',
];

const DEV_NULL = '/dev/null';

export interface DiffHunk {
  /** Position in the original diff, used to break ties. */
  index: number;
  file: string;
  header: string;
  lines: string[];
  additions: number;
  deletions: number;
  fileDeleted: boolean;
}

export interface DiffFileBlock {
  file: string;
  headerLines: string[];
  hunks: DiffHunk[];
  deleted: boolean;
}

export interface OmittedHunk {
  file: string;
  header: string;
  /** True when the hunk was cut rather than dropped. */
  partial: boolean;
}

export interface TruncationResult {
  diff: string;
  truncated: boolean;
  originalChars: number;
  finalChars: number;
  omitted: OmittedHunk[];
  excludedFiles: string[];
  keptHunks: number;
}

export interface TruncationOptions {
  maxChars: number;
  exclude?: string[];
}

function fileName(file: ParsedFile): string {
  if (file.to && file.to !== DEV_NULL) {
    return file.to;
  }
  return file.from && file.from !== DEV_NULL ? file.from : 'unknown';
}

function renderFileHeader(file: ParsedFile, name: string): string[] {
  const from = file.from ?? name;
  const to = file.to ?? name;
  return [
    `diff --git a/${name} b/${name}`,
    `--- ${from === DEV_NULL ? DEV_NULL : `a/${from}`}`,
    `+++ ${to === DEV_NULL ? DEV_NULL : `b/${to}`}`,
  ];
}

/**
 * Splits a unified diff into per-file blocks of hunks. Files without textual
 * hunks (binary files, pure renames, mode changes) are left out.
 */
export function splitDiff(diff: string): DiffFileBlock[] {
  let index = 0;
  return parseDiff(diff)
    .filter((file) => file.chunks.length > 0)
    .map((file) => {
      const name = fileName(file);
      const deleted = file.deleted === true || file.to === DEV_NULL;
      return {
        file: name,
        headerLines: renderFileHeader(file, name),
        deleted,
        hunks: file.chunks.map((chunk) => {
          const hunk: DiffHunk = {
            index: index++,
            file: name,
            header: chunk.content,
            lines: chunk.changes.map((change) => change.content),
            additions: chunk.changes.filter(
              (change) => change.type === 'add' && !change.content.startsWith('\\'),
            ).length,
            deletions: chunk.changes.filter(
              (change) => change.type === 'del' && !change.content.startsWith('\\'),
            ).length,
            fileDeleted: deleted,
          };
          return hunk;
        }),
      };
    });
}

export function isExcluded(file: string, patterns: string[]): boolean {
  return patterns.some((pattern) => minimatch(file, pattern, { dot: true }));
}

/** Length of `lines.join('\n') + '\n'`, the way {@link renderBlocks} writes them. */
function linesCost(lines: string[]): number {
  return lines.reduce((sum, line) => sum + line.length + 1, 0);
}

function hunkCost(hunk: DiffHunk): number {
  return linesCost([hunk.header, ...hunk.lines]);
}

export function renderBlocks(blocks: DiffFileBlock[]): string {
  const lines: string[] = [];
  for (const block of blocks) {
    if (block.hunks.length === 0) {
      continue;
    }
    lines.push(...block.headerLines);
    for (const hunk of block.hunks) {
      lines.push(hunk.header, ...hunk.lines);
    }
  }
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}

/**
 * Ordering used when the diff is over budget, least relevant first: hunks of
 * deleted files, then deletion-only hunks, then the rest by number of added
 * lines. Ties go to the hunk that appears later in the diff.
 */
export function compareRelevance(a: DiffHunk, b: DiffHunk): number {
  const tier = (hunk: DiffHunk) => (hunk.fileDeleted ? 0 : hunk.additions === 0 ? 1 : 2);
  const byTier = tier(a) - tier(b);
  if (byTier !== 0) {
    return byTier;
  }
  if (tier(a) === 2 && a.additions !== b.additions) {
    return a.additions - b.additions;
  }
  return b.index - a.index;
}

/**
 * Drops excluded files, then removes the least relevant hunks until the
 * rendered diff fits in `maxChars`. When a single remaining hunk is still too
 * large it is cut at a line boundary.
 */
export function truncateDiff(
  diff: string,
  options: TruncationOptions,
): TruncationResult {
  const patterns = [...DEFAULT_EXCLUDES, ...(options.exclude ?? [])];
  const excludedFiles: string[] = [];
  const blocks = splitDiff(diff).filter((block) => {
    if (isExcluded(block.file, patterns)) {
      excludedFiles.push(block.file);
      return false;
    }
    return true;
  });

  const omitted: OmittedHunk[] = [];
  const headerCost = new Map<string, number>(
    blocks.map((block): [string, number] => [block.file, linesCost(block.headerLines)]),
  );
  const kept = new Set(blocks.flatMap((block) => block.hunks));
  const keptPerFile = new Map<string, number>(
    blocks.map((block): [string, number] => [block.file, block.hunks.length]),
  );

  let total = blocks.reduce(
    (sum, block) =>
      sum + linesCost(block.headerLines) + block.hunks.reduce((acc, hunk) => acc + hunkCost(hunk), 0),
    0,
  );

  const candidates = [...kept].sort(compareRelevance);
  for (const hunk of candidates) {
    if (total <= options.maxChars || kept.size <= 1) {
      break;
    }
    kept.delete(hunk);
    omitted.push({ file: hunk.file, header: hunk.header, partial: false });
    total -= hunkCost(hunk);
    const remaining = (keptPerFile.get(hunk.file) ?? 1) - 1;
    keptPerFile.set(hunk.file, remaining);
    if (remaining === 0) {
      total -= headerCost.get(hunk.file) ?? 0;
    }
  }

  let cut: DiffHunk | undefined;
  if (total > options.maxChars && kept.size === 1) {
    const [last] = kept;
    cut = cutHunk(last, options.maxChars - (total - hunkCost(last)));
    omitted.push({ file: last.file, header: last.header, partial: true });
  }

  const finalBlocks = blocks.map((block) => ({
    ...block,
    hunks: block.hunks
      .filter((hunk) => kept.has(hunk))
      .map((hunk) => (cut && cut.index === hunk.index ? cut : hunk)),
  }));
  const output = renderBlocks(finalBlocks);

  return {
    diff: output,
    truncated: omitted.length > 0,
    originalChars: diff.length,
    finalChars: output.length,
    omitted,
    excludedFiles,
    keptHunks: kept.size,
  };
}

/** Keeps as many whole lines of the hunk as fit in `budget` characters. */
function cutHunk(hunk: DiffHunk, budget: number): DiffHunk {
  let used = hunk.header.length + 1;
  const lines: string[] = [];
  for (const line of hunk.lines) {
    if (used + line.length + 1 > budget) {
      break;
    }
    lines.push(line);
    used += line.length + 1;
  }
  return {
    ...hunk,
    lines,
    additions: lines.filter((line) => line.startsWith('+')).length,
    deletions: lines.filter((line) => line.startsWith('-')).length,
  };
}

const MAX_LISTED_HUNKS = 10;

/** Human-readable account of what was left out, or undefined when nothing was. */
export function describeTruncation(result: TruncationResult): string | undefined {
  const parts: string[] = [];
  if (result.omitted.length > 0) {
    const files = new Set(result.omitted.map((hunk) => hunk.file));
    const listed = result.omitted
      .slice(0, MAX_LISTED_HUNKS)
      .map((hunk) => `\`${hunk.file}\` ${hunk.header.split(' @@')[0]} @@${hunk.partial ? ' (cut)' : ''}`);
    const more =
      result.omitted.length > MAX_LISTED_HUNKS
        ? ` and ${result.omitted.length - MAX_LISTED_HUNKS} more`
        : '';
    parts.push(
      `The diff was too large to review in full; ${result.omitted.length} hunk(s) in ${files.size} file(s) were left out: ${listed.join(', ')}${more}.`,
    );
  }
  if (result.excludedFiles.length > 0) {
    parts.push(`Skipped generated or lock files: ${result.excludedFiles.map((file) => `\`${file}\``).join(', ')}.`);
  }
  return parts.length > 0 ? parts.join(' ') : undefined;
}

export function summarizeTruncation(result: TruncationResult): TruncationSummary {
  return {
    truncated: result.truncated,
    originalChars: result.originalChars,
    finalChars: result.finalChars,
    omittedHunks: result.omitted.length,
    excludedFiles: result.excludedFiles,
  };
}
