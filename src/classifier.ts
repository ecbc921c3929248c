/**
 * Process Classifier
 * Layer: core
 *
 * Provided ports:
 *   - classifier.classify
 *
 * Decides which processes in a snapshot need exclusive GPU access.
 *
 * Matching (per process, boolean OR):
 *   1. any literal pattern is an exact substring of the command line
 *   2. any keyword stem is a case-insensitive substring of the command line
 *
 * Substring matching is deliberately loose: the stem "build" also matches
 * "rebuild.sh". The rule that fired is carried on each handle so false
 * positives can be spotted in the logs.
 */

import type { MatchRule, ProcessHandle, ProcessInfo, ProcessSnapshot } from './types';

export interface ProcessClassifier {
  /**
   * Returns the exclusive-access processes in the snapshot, sorted by pid.
   * Never throws; a process that cannot be inspected is left out.
   */
  classify(snapshot: ProcessSnapshot): readonly ProcessHandle[];
}

export interface SubstringClassifierOptions {
  literalPatterns: Iterable<string>;
  keywordStems: Iterable<string>;
}

export interface CommandLineMatch {
  rule: MatchRule;
  matched: string;
}

/**
 * Matches one command line. Literal patterns are checked before stems;
 * both lists are expected pre-sorted so the reported match is stable.
 *
 * @param stems - lower-cased keyword stems
 */
export function matchCommandLine(
  commandLine: string,
  patterns: readonly string[],
  stems: readonly string[],
): CommandLineMatch | null {
  const literal = patterns.find((pattern) => commandLine.includes(pattern));
  if (literal !== undefined) {
    return { rule: 'literal', matched: literal };
  }

  const lowered = commandLine.toLowerCase();
  const stem = stems.find((s) => lowered.includes(s));
  if (stem !== undefined) {
    return { rule: 'keyword', matched: stem };
  }

  return null;
}

// -----------------------------------------------------------------------------
// Port: classifier.classify
// -----------------------------------------------------------------------------

export function createSubstringClassifier(options: SubstringClassifierOptions): ProcessClassifier {
  const patterns = [...new Set(options.literalPatterns)].filter((p) => p !== '').sort();
  const stems = [...new Set([...options.keywordStems].map((s) => s.toLowerCase()))]
    .filter((s) => s !== '')
    .sort();

  return {
    classify(snapshot: ProcessSnapshot): readonly ProcessHandle[] {
      const byPid = new Map<number, ProcessHandle>();

      for (const proc of snapshot.processes) {
        if (!isInspectable(proc) || byPid.has(proc.pid)) continue;

        const match = matchCommandLine(proc.commandLine, patterns, stems);
        if (match) {
          byPid.set(proc.pid, { pid: proc.pid, name: proc.name, ...match });
        }
      }

      return [...byPid.values()].sort((a, b) => a.pid - b.pid);
    },
  };
}

// Snapshots come from an external tool; entries with a missing command line
// are processes we could not read.
function isInspectable(proc: ProcessInfo): boolean {
  return Number.isInteger(proc.pid) && typeof proc.commandLine === 'string' && proc.commandLine !== '';
}
