import { z } from 'zod';
import { DEFAULT_ACTIVITY_PATTERNS, DEFAULT_PROMPT_PATTERNS } from '../status/rules.js';

/** One prompt/activity pattern as written in config.yaml. */
export const PatternRuleSchema = z.object({
  pattern: z.string().min(1),
  flags: z.string().regex(/^[dimsuv]*$/).optional(),
  scope: z.enum(['last-line', 'tail']).optional().default('tail'),
});

/** Zod schema for ~/.paneward/config.yaml. Every key is optional. */
export const PanewardConfigSchema = z
  .object({
    /** Milliseconds between poll cycles. */
    pollIntervalMs: z.number().int().min(250).default(2_000),
    /** Quiescence (ms) that must be exceeded before a session is ready. */
    debounceMs: z.number().int().min(0).default(6_000),
    /** Budget for each tmux call; must be shorter than a poll interval. */
    commandTimeoutMs: z.number().int().min(50).default(1_500),
    /** Trailing pane lines kept for fingerprinting and prompt detection. */
    captureLines: z.number().int().min(1).default(8),
    /** Non-blank lines at the end of the capture that tail patterns look at. */
    promptWindowLines: z.number().int().min(1).default(3),
    /** Consecutive capture failures before a session is flagged stale. */
    staleAfterFailures: z.number().int().min(1).default(3),
    /** Consecutive cycles a session must be missing before it is dropped. */
    removalGraceCycles: z.number().int().min(1).default(2),
    /** tmux session names are `{prefix}-{name}`; empty string disables the prefix. */
    sessionPrefix: z.string().regex(/^[A-Za-z0-9_-]*$/).default('pw'),
    /** Command typed into every new session; empty string launches a bare shell. */
    launchCommand: z.string().default('claude'),
    promptPatterns: z.array(PatternRuleSchema).default(() => DEFAULT_PROMPT_PATTERNS.map((r) => ({ ...r }))),
    activityPatterns: z.array(PatternRuleSchema).default(() => DEFAULT_ACTIVITY_PATTERNS.map((r) => ({ ...r }))),
  })
  .refine((c) => c.commandTimeoutMs < c.pollIntervalMs, {
    message: 'commandTimeoutMs must be shorter than pollIntervalMs',
    path: ['commandTimeoutMs'],
  });

/** TypeScript type for validated configuration. */
export type PanewardConfig = z.infer<typeof PanewardConfigSchema>;

/** Raw, pre-validation shape accepted by the loader and CLI overrides. */
export type PanewardConfigInput = z.input<typeof PanewardConfigSchema>;
