/** Session names are limited to characters tmux accepts in a target. */
export const SESSION_NAME_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

/**
 * Generates the tmux session name for a user-facing name.
 *
 * @example
 * sessionIdFor('swift-fox', 'pw') // → 'pw-swift-fox'
 * sessionIdFor('swift-fox', '')   // → 'swift-fox'
 */
export function sessionIdFor(name: string, prefix: string): string {
  return prefix ? `${prefix}-${name}` : name;
}

/** True when `id` belongs to this prefix's namespace. */
export function hasSessionPrefix(id: string, prefix: string): boolean {
  return prefix === '' || (id.startsWith(`${prefix}-`) && id.length > prefix.length + 1);
}

/** Default label for a session found externally: the id without its prefix. */
export function displayNameFromId(id: string, prefix: string): string {
  return hasSessionPrefix(id, prefix) && prefix !== '' ? id.slice(prefix.length + 1) : id;
}
