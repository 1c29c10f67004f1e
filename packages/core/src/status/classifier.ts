import { SessionStatus } from '../session/types.js';
import {
  compileRules,
  DEFAULT_ACTIVITY_PATTERNS,
  DEFAULT_PROMPT_PATTERNS,
  matchesAny,
  trailingRegions,
} from './rules.js';
import type { CompiledRule } from './rules.js';

/** Tunables for status classification. */
export interface ClassifierOptions {
  /** Quiescence (ms) that must be exceeded before a session is declared ready. */
  debounceMs: number;
  /** Non-blank lines at the end of the pane that `tail` rules look at. */
  promptWindowLines: number;
  promptRules: readonly CompiledRule[];
  activityRules: readonly CompiledRule[];
}

export const DEFAULT_CLASSIFIER_OPTIONS: ClassifierOptions = {
  debounceMs: 6_000,
  promptWindowLines: 3,
  promptRules: compileRules(DEFAULT_PROMPT_PATTERNS, 'promptPatterns'),
  activityRules: compileRules(DEFAULT_ACTIVITY_PATTERNS, 'activityPatterns'),
};

/**
 * True when the trailing region of the pane asks the operator for input and
 * nothing in that region says the agent is still busy.
 */
export function detectsInputPrompt(
  paneText: string,
  options: ClassifierOptions = DEFAULT_CLASSIFIER_OPTIONS,
): boolean {
  const regions = trailingRegions(paneText, options.promptWindowLines);
  if (regions.lastLine === '') return false;
  if (matchesAny(options.activityRules, regions)) return false;
  return matchesAny(options.promptRules, regions);
}

/**
 * Maps one poll observation of a session to its next status.
 *
 * Evaluation order, first match wins:
 *  1. needs_input: an input prompt is visible, whatever the debounce or prior status
 *  2. working:     the output changed this poll, or the pane is still empty
 *  3. ready:       unchanged for longer than the debounce after working/needs_input
 *  4. otherwise ready and seen hold; anything else stays working
 *
 * `seen` is never produced from pane content, only held once acknowledged.
 *
 * @param paneText - Normalized capture (see normalizePane)
 */
export function classify(
  previousStatus: SessionStatus,
  fingerprintChanged: boolean,
  quiescentDuration: number,
  paneText: string,
  options: ClassifierOptions = DEFAULT_CLASSIFIER_OPTIONS,
): SessionStatus {
  if (detectsInputPrompt(paneText, options)) return SessionStatus.NeedsInput;

  if (fingerprintChanged || paneText.trim() === '') return SessionStatus.Working;

  if (previousStatus === SessionStatus.Ready || previousStatus === SessionStatus.Seen) {
    return previousStatus;
  }

  return quiescentDuration > options.debounceMs ? SessionStatus.Ready : SessionStatus.Working;
}
