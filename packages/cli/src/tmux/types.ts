/** Options for the tmux-backed pane source. */
export interface TmuxSourceOptions {
  /** Only sessions named `{prefix}-*` are tracked; empty string tracks all. */
  sessionPrefix: string;
  /** Budget for each tmux call in milliseconds. */
  timeoutMs: number;
}

/** Session metadata parsed from `tmux list-sessions`. */
export interface TmuxSessionInfo {
  name: string;
  /** Epoch ms reported by tmux. */
  createdAt: number;
  attached: boolean;
}
