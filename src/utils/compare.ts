import type { ComparisonPair, ResultFiles } from '../types.js';
import { joinCommand } from './shell.js';

export const COMPARISON_HEADING =
  'You can run one of these commands to view differences in test results.';

const DIFF_TOOLS: ReadonlyArray<readonly string[]> = [['meld'], ['kdiff3'], ['diff', '-u']];

/**
 * Adjacent summary files, plus first against last when more than two runs
 * were made.
 */
export function comparisonPairs(files: readonly ResultFiles[]): ComparisonPair[] {
  const pairs: ComparisonPair[] = [];

  for (let i = 1; i < files.length; i++) {
    pairs.push({ before: files[i - 1].summaryFile, after: files[i].summaryFile });
  }

  if (files.length > 2) {
    pairs.push({
      before: files[0].summaryFile,
      after: files[files.length - 1].summaryFile,
    });
  }

  return pairs;
}

export function comparisonCommands(pair: ComparisonPair): string[] {
  return DIFF_TOOLS.map((tool) => joinCommand([...tool, pair.before, pair.after]));
}

export function formatComparisons(pairs: readonly ComparisonPair[]): string[] {
  if (pairs.length === 0) {
    return [];
  }

  const lines = ['', COMPARISON_HEADING];
  for (const pair of pairs) {
    lines.push('');
    for (const command of comparisonCommands(pair)) {
      lines.push(`  ${command}`);
    }
  }
  return lines;
}
