import type { Generation } from '../engine/types';
import { toTimestamp } from './mapping';

// "  12   2024-02-01 09:00:00   (current)"
const LISTING_LINE = /^\s*(\d+)\s+(\d{4}-\d{2}-\d{2})\s+(\d{2}:\d{2}:\d{2})\s*(\(current\))?\s*$/;

/**
 * Parses `nix-env --list-generations` output. Lines that do not look like a
 * generation entry (warnings, blank lines) are skipped.
 */
export function parseGenerationListing(output: string): Generation[] {
  const generations: Generation[] = [];

  for (const line of output.split('\n')) {
    const match = LISTING_LINE.exec(line);
    if (!match) continue;

    generations.push({
      id: Number(match[1]),
      timestamp: toTimestamp(`${match[2]} ${match[3]}`),
      current: match[4] !== undefined,
      description: null,
    });
  }

  return generations;
}
