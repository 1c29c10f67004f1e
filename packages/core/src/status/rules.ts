import { ValidationError } from '../errors.js';

/**
 * Where a pattern is tested:
 *  - last-line: only the last non-blank line of the pane
 *  - tail:      the last `promptWindowLines` non-blank lines, joined by newlines
 */
export type PatternScope = 'last-line' | 'tail';

/** A pattern as written in config.yaml. */
export interface PatternRule {
  pattern: string;
  flags?: string;
  scope?: PatternScope;
}

/** A pattern ready for matching. */
export interface CompiledRule {
  regex: RegExp;
  scope: PatternScope;
  source: string;
}

export const DEFAULT_PROMPT_PATTERNS: readonly PatternRule[] = [
  { pattern: '\\?$', scope: 'last-line' },
  { pattern: '\\((?:y/n|yes/no)\\)', flags: 'i', scope: 'tail' },
  { pattern: '\\[(?:y/n|Y/n|y/N)\\]', scope: 'tail' },
  { pattern: 'Do you want to', scope: 'tail' },
  { pattern: 'Would you like to proceed', scope: 'tail' },
  { pattern: 'Press Enter to continue', flags: 'i', scope: 'tail' },
  { pattern: '^\\s*(?:[❯>]\\s*)?1\\.\\s+Yes\\b', flags: 'm', scope: 'tail' },
];

export const DEFAULT_ACTIVITY_PATTERNS: readonly PatternRule[] = [
  { pattern: 'esc to interrupt', flags: 'i', scope: 'tail' },
  { pattern: '[⠋⠙⠹⠸⠼⠴⠦⠧⠇⠏]', scope: 'tail' },
];

/**
 * Compiles config-level pattern rules.
 *
 * @throws {ValidationError} when a pattern is not a valid regular expression
 */
export function compileRules(rules: readonly PatternRule[], path: string): CompiledRule[] {
  return rules.map((rule, index) => {
    // Global/sticky regexes keep lastIndex between test() calls.
    const flags = (rule.flags ?? '').replace(/[gy]/g, '');
    try {
      return {
        regex: new RegExp(rule.pattern, flags),
        scope: rule.scope ?? 'tail',
        source: rule.pattern,
      };
    } catch (err) {
      throw new ValidationError(
        `Invalid pattern at ${path}[${index}]: ${err instanceof Error ? err.message : String(err)}`,
        `${path}.${index}`,
      );
    }
  });
}

/** Splits normalized pane text into its last-line and tail regions. */
export function trailingRegions(
  normalized: string,
  windowLines: number,
): { lastLine: string; tail: string } {
  const nonBlank = normalized.split('\n').filter((line) => line.trim() !== '');
  const lastLine = nonBlank.length > 0 ? nonBlank[nonBlank.length - 1] : '';
  const tail = nonBlank.slice(Math.max(0, nonBlank.length - windowLines)).join('\n');
  return { lastLine, tail };
}

/** True when any rule matches its region. */
export function matchesAny(
  rules: readonly CompiledRule[],
  regions: { lastLine: string; tail: string },
): boolean {
  return rules.some((rule) =>
    rule.regex.test(rule.scope === 'last-line' ? regions.lastLine : regions.tail),
  );
}
