const ADJECTIVES = [
  'swift', 'bright', 'quiet', 'bold', 'cool', 'calm', 'wild', 'deep',
  'keen', 'wise', 'pure', 'warm', 'fresh', 'smooth', 'sharp', 'clear',
] as const;

const NOUNS = [
  'fox', 'hawk', 'wolf', 'bear', 'lynx', 'eagle', 'raven', 'otter',
  'spark', 'wave', 'node', 'pixel', 'cloud', 'forge', 'vertex', 'prism',
] as const;

function pick<T>(items: readonly T[], random: () => number): T {
  return items[Math.floor(random() * items.length) % items.length];
}

/** Random session name like 'swift-fox' or 'bright-node'. */
export function generateSessionName(random: () => number = Math.random): string {
  return `${pick(ADJECTIVES, random)}-${pick(NOUNS, random)}`;
}
